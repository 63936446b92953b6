/**
 * Saving and deleting single records. Every write is one statement through the driver, wrapped by the model's
 * lifecycle hooks: before hooks can still stop the write, after hooks run once it went through.
 * @module
 */

import { compile_statement, Statement } from '../compiler/compiler'
import { Driver, RunResult } from '../helpers/database_adapters'
import {
    PersistenceError,
    throw_if_aborted,
} from '../helpers/error_handling'
import { is_nill, is_simple_object } from '../helpers/helpers'
import { get_primary_key_fields, ModelDescriptor } from '../schema/schema_types'
import { OrmRecord } from '../types'
import {
    apply_defaults,
    is_json_value,
    serialize_record,
    validate_record,
} from '../validation/record_validation'
import { QueryContext } from '../query/execute_query'
import { HookContext, HookEvent, HookRegistry } from './hooks'
import {
    get_delete_statement,
    get_insert_statement,
    get_primary_key_where,
    get_update_statement,
} from './mutation_statements'

export type SaveContext = QueryContext & {
    readonly hooks: HookRegistry
}

export type SaveOptions = {
    /**
     * Insert even when the primary key is already set
     */
    readonly force_insert?: boolean
    readonly signal?: AbortSignal
}

const get_error_message = (error: unknown) =>
    error instanceof Error ? error.message : String(error)

export const run_statement = async (
    driver: Driver,
    model: ModelDescriptor,
    statement: Statement,
    action: 'insert' | 'update' | 'delete'
): Promise<RunResult> => {
    try {
        return await driver.run(compile_statement(statement, driver.dialect))
    } catch (error) {
        throw new PersistenceError(
            `Could not ${action} ${model.name}: ${get_error_message(error)}`,
            { model: model.name, cause: error }
        )
    }
}

export const run_before_hooks = async (
    hooks: HookRegistry,
    event: HookEvent,
    record: OrmRecord,
    hook_context: HookContext
) => {
    try {
        await hooks.run(event, record, hook_context)
    } catch (error) {
        throw new PersistenceError(
            `A ${event} hook of ${hook_context.model} failed: ${get_error_message(
                error
            )}`,
            { model: hook_context.model, cause: error }
        )
    }
}

/**
 * The write is already done when these run, so a failing hook is logged and reported as committed
 */
export const run_after_hooks = async (
    { hooks, logger }: SaveContext,
    event: HookEvent,
    record: OrmRecord,
    hook_context: HookContext
) => {
    try {
        await hooks.run(event, record, hook_context)
    } catch (error) {
        logger.error(
            { err: error, model: hook_context.model, event },
            'after hook failed'
        )
        throw new PersistenceError(
            `A ${event} hook of ${
                hook_context.model
            } failed after the write was committed: ${get_error_message(
                error
            )}`,
            { model: hook_context.model, cause: error, committed: true }
        )
    }
}

/**
 * Field values of a record, leaving out nested relations
 */
const get_field_values = (model: ModelDescriptor, record: OrmRecord) => {
    const values: OrmRecord = {}
    model.fields.forEach(field => {
        if (record[field.name] !== undefined) {
            values[field.name] = record[field.name]
        }
    })
    return values
}

/**
 * Copies the key of a nested to-one record into the foreign key field, so `{ author: saved_author }` works
 * in place of `{ author_id: saved_author.id }`
 */
export const link_related_keys = (model: ModelDescriptor, record: OrmRecord) => {
    model.relations
        .filter(relation => relation.through === undefined)
        .filter(
            relation =>
                relation.cardinality === 'MANY_TO_ONE' ||
                relation.cardinality === 'ONE_TO_ONE'
        )
        .forEach(relation => {
            const related = record[relation.name]
            if (!is_nill(record[relation.from_field]) || !is_simple_object(related)) {
                return
            }

            const key = related[relation.to_field]
            if (key instanceof Date || (is_json_value(key) && key !== null)) {
                record[relation.from_field] = key
            }
        })
}

const write_generated_key = (
    model: ModelDescriptor,
    record: OrmRecord,
    result: RunResult
) => {
    get_primary_key_fields(model)
        .filter(field => is_nill(record[field.name]))
        .forEach(field => {
            const generated = result.rows?.[0]?.[field.column] ?? result.insert_id
            if (generated === undefined) {
                throw new PersistenceError(
                    `The database reported no generated ${field.name} for the inserted ${model.name}.`,
                    { model: model.name, committed: true }
                )
            }

            record[field.name] = validate_record(
                model,
                { [field.name]: generated },
                'hydrate'
            )[field.name]
        })
}

/**
 * Inserts a record without running hooks. Defaults, coerced values and the generated key are written back to
 * the record.
 */
export const insert_record = async (
    driver: Driver,
    model: ModelDescriptor,
    record: OrmRecord
) => {
    link_related_keys(model, record)
    const validated = validate_record(
        model,
        apply_defaults(model, get_field_values(model, record)),
        'insert'
    )
    const result = await run_statement(
        driver,
        model,
        get_insert_statement(
            model,
            serialize_record(model, validated, driver.dialect)
        ),
        'insert'
    )

    Object.assign(record, validated)
    write_generated_key(model, record, result)
}

const update_record = async (
    driver: Driver,
    model: ModelDescriptor,
    record: OrmRecord
) => {
    link_related_keys(model, record)
    const validated = validate_record(
        model,
        get_field_values(model, record),
        'update'
    )
    const row = serialize_record(model, validated, driver.dialect)
    const primary_key_columns = get_primary_key_fields(model).map(
        field => field.column
    )
    const set_row = Object.fromEntries(
        Object.entries(row).filter(
            ([column]) => !primary_key_columns.includes(column)
        )
    )

    // setting the key to itself still reports whether the row exists
    const result = await run_statement(
        driver,
        model,
        get_update_statement(
            model,
            Object.keys(set_row).length > 0 ? set_row : row,
            get_primary_key_where(model, validated, driver.dialect)
        ),
        'update'
    )

    if (result.affected_rows === 0) {
        throw new PersistenceError(
            `Could not update ${model.name}: no row has its primary key.`,
            { model: model.name }
        )
    }

    Object.assign(record, validated)
}

/**
 * Inserts the record when its primary key is unassigned (or force_insert is set), otherwise updates the row
 * with its primary key. The record itself is updated with what was written, including generated keys.
 */
export const save_record = async (
    context: SaveContext,
    model_name: string,
    record: OrmRecord,
    { force_insert = false, signal }: SaveOptions = {}
): Promise<OrmRecord> => {
    throw_if_aborted(signal)
    const { registry, driver, hooks } = context
    const model = registry.get_model(model_name)
    const is_insert =
        force_insert ||
        get_primary_key_fields(model).some(field =>
            is_nill(record[field.name])
        )

    const hook_context: HookContext = {
        model: model_name,
        operation: is_insert ? 'insert' : 'update',
        driver,
    }
    await run_before_hooks(hooks, 'before_save', record, hook_context)

    if (is_insert) {
        await insert_record(driver, model, record)
    } else {
        await update_record(driver, model, record)
    }

    await run_after_hooks(context, 'after_save', record, hook_context)
    return record
}

/**
 * Deletes the row with the record's primary key. Rows referencing it are only removed with it when their
 * relation is declared with on_delete cascade, otherwise the database rejects the delete.
 * @returns the number of deleted rows, 0 when no row had the key
 */
export const delete_record = async (
    context: SaveContext,
    model_name: string,
    record: OrmRecord,
    { signal }: Pick<SaveOptions, 'signal'> = {}
): Promise<number> => {
    throw_if_aborted(signal)
    const { registry, driver, hooks } = context
    const model = registry.get_model(model_name)
    const where = get_primary_key_where(model, record, driver.dialect)

    const hook_context: HookContext = {
        model: model_name,
        operation: 'delete',
        driver,
    }
    await run_before_hooks(hooks, 'before_delete', record, hook_context)

    const { affected_rows } = await run_statement(
        driver,
        model,
        get_delete_statement(model, where),
        'delete'
    )

    await run_after_hooks(context, 'after_delete', record, hook_context)
    return affected_rows
}
