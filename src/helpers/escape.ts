import { escape, escapeId, format } from 'sqlstring'
import { Dialect } from '../types'

/**
 * Quotes a table, alias or column name. Names come from model declarations, which only allow word characters,
 * so quoting is only there to keep reserved words (order, group, ...) usable.
 */
export const escape_identifier = (dialect: Dialect, identifier: string) =>
    dialect === 'postgres'
        ? `"${identifier.replace(/"/g, '""')}"`
        : escapeId(identifier, true)

/**
 * Literal for places that cannot take a bound parameter, such as a DEFAULT in a column definition.
 * sqlstring escapes quotes with backslashes, which only mysql understands.
 */
export const escape_literal = (
    dialect: Dialect,
    value: string | number | boolean
) => {
    if (dialect === 'mysql') {
        return escape(value)
    }

    if (typeof value === 'string') {
        return `'${value.replace(/'/g, "''")}'`
    }

    if (typeof value === 'boolean') {
        return value ? 'TRUE' : 'FALSE'
    }

    return String(value)
}

/**
 * Inlines the params into the sql string. Only meant for log output, statements are always executed with
 * bound params.
 */
export const format_statement = (
    dialect: Dialect,
    sql_string: string,
    params: readonly unknown[]
) => {
    if (dialect === 'postgres') {
        return sql_string.replace(/\$(\d+)/g, (match, index: string) => {
            const position = Number(index) - 1
            return position < params.length
                ? escape(params[position])
                : match
        })
    }

    return format(sql_string, [...params])
}
