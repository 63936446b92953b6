import { ConfigurationError } from '../helpers/error_handling'
import { get_matching_keys } from '../query/execute_query'
import { BulkOptions, QuerySpec } from '../query/query_types'
import { OrmRecord } from '../types'
import {
    serialize_record,
    validate_record,
} from '../validation/record_validation'
import {
    get_delete_statement,
    get_key_rows_where,
    get_update_statement,
} from './mutation_statements'
import { run_statement, SaveContext } from './save'

const check_bulk_filter = (
    spec: QuerySpec,
    action: string,
    { each = false }: BulkOptions
) => {
    if (spec.where === undefined && !each) {
        throw new ConfigurationError(
            `Refusing to ${action} every ${spec.model} without a filter.`,
            {
                model: spec.model,
                recommendation: `Add a filter, or pass { each: true } to ${action} all rows.`,
            }
        )
    }
}

/**
 * Sets the given fields on every record matching the QuerySpec. Hooks do not run for bulk writes.
 * @returns the number of updated rows
 */
export const bulk_update = async (
    context: SaveContext,
    spec: QuerySpec,
    values: OrmRecord,
    options: BulkOptions = {}
): Promise<number> => {
    check_bulk_filter(spec, 'update', options)
    const model = context.registry.get_model(spec.model)
    const row = serialize_record(
        model,
        validate_record(model, values, 'update'),
        context.driver.dialect
    )
    if (Object.keys(row).length === 0) {
        throw new ConfigurationError(
            `Nothing to update: no field of ${spec.model} was given.`,
            { model: spec.model }
        )
    }

    // matching rows are selected first, so filters through relations work the same as in queries
    return context.driver.transaction(async driver => {
        const keys = await get_matching_keys(
            { ...context, driver },
            spec,
            options.signal
        )
        if (keys.length === 0) {
            return 0
        }

        const { affected_rows } = await run_statement(
            driver,
            model,
            get_update_statement(model, row, get_key_rows_where(model, keys)),
            'update'
        )
        return affected_rows
    })
}

/**
 * Deletes every record matching the QuerySpec. Hooks do not run for bulk writes.
 * @returns the number of deleted rows
 */
export const bulk_delete = async (
    context: SaveContext,
    spec: QuerySpec,
    options: BulkOptions = {}
): Promise<number> => {
    check_bulk_filter(spec, 'delete', options)
    const model = context.registry.get_model(spec.model)

    return context.driver.transaction(async driver => {
        const keys = await get_matching_keys(
            { ...context, driver },
            spec,
            options.signal
        )
        if (keys.length === 0) {
            return 0
        }

        const { affected_rows } = await run_statement(
            driver,
            model,
            get_delete_statement(model, get_key_rows_where(model, keys)),
            'delete'
        )
        return affected_rows
    })
}
