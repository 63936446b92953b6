import { Where } from '../compiler/query/compile_where'
import { InsertInto } from '../compiler/mutate/compile_insert_into'
import { Update } from '../compiler/mutate/compile_update'
import { Delete } from '../compiler/mutate/compile_delete'
import { PersistenceError } from '../helpers/error_handling'
import { is_nill } from '../helpers/helpers'
import { get_primary_key_fields, ModelDescriptor } from '../schema/schema_types'
import { Dialect, OrmRecord, Row } from '../types'
import { serialize_record } from '../validation/record_validation'

/**
 * Condition matching one record by its primary key, built from the record's field values
 */
export const get_primary_key_where = (
    model: ModelDescriptor,
    record: OrmRecord,
    dialect: Dialect
): Where => {
    const primary_key_fields = get_primary_key_fields(model)
    const missing = primary_key_fields.filter(field =>
        is_nill(record[field.name])
    )
    if (missing.length > 0) {
        throw new PersistenceError(
            `${model.name} has no value for its primary key ${missing
                .map(field => field.name)
                .join(', ')}.`,
            { model: model.name }
        )
    }

    const key_row = serialize_record(
        model,
        Object.fromEntries(
            primary_key_fields.map(field => [field.name, record[field.name]])
        ),
        dialect
    )
    const conditions: Where[] = primary_key_fields.map(field => ({
        eq: [{ column: field.column }, { param: key_row[field.column] }],
    }))

    return conditions.length === 1 ? conditions[0] : { and: conditions }
}

/**
 * Condition matching every key row given, as returned by a key select (aliased by field name)
 */
export const get_key_rows_where = (
    model: ModelDescriptor,
    key_rows: readonly Row[]
): Where => {
    const primary_key_fields = get_primary_key_fields(model)
    if (primary_key_fields.length === 1) {
        const [field] = primary_key_fields
        return {
            in: [
                { column: field.column },
                key_rows.map(row => ({ param: row[field.name] })),
            ],
        }
    }

    return {
        or: key_rows.map(row => ({
            and: primary_key_fields.map(field => ({
                eq: [{ column: field.column }, { param: row[field.name] }],
            })),
        })),
    }
}

/**
 * @param row serialized values keyed by column
 */
export const get_insert_statement = (
    model: ModelDescriptor,
    row: Row
): InsertInto => {
    const columns = Object.keys(row)
    return {
        insert_into: model.table,
        columns,
        values: [columns.map(column => row[column])],
        // compiled for postgres only, the other dialects report the key through the driver
        returning: get_primary_key_fields(model).map(field => field.column),
    }
}

export const get_update_statement = (
    model: ModelDescriptor,
    row: Row,
    where: Where
): Update => ({
    update: model.table,
    set: Object.entries(row).map(([column, value]) => ({ column, value })),
    where,
})

export const get_delete_statement = (
    model: ModelDescriptor,
    where: Where
): Delete => ({
    delete_from: model.table,
    where,
})
