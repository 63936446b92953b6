import { escape_identifier } from '../../helpers/escape'
import { CompilerArgs } from '../compiler'

export type InsertInto = {
    readonly insert_into: string
    readonly columns: readonly string[]
    readonly values: readonly (readonly unknown[])[]
    /**
     * Columns to hand back from the inserted rows. Only postgres supports this, the other dialects report the
     * generated key through the driver.
     */
    readonly returning?: readonly string[]
}

export const compile_insert_into = ({
    statement,
    dialect,
    params,
}: CompilerArgs<InsertInto>): string => {
    const table_string = escape_identifier(dialect, statement.insert_into)

    const returning_string =
        dialect === 'postgres' && statement.returning?.length
            ? ` RETURNING ${statement.returning
                  .map(column => escape_identifier(dialect, column))
                  .join(', ')}`
            : ''

    if (statement.columns.length === 0) {
        const default_values_string =
            dialect === 'mysql' ? '() VALUES ()' : 'DEFAULT VALUES'
        return `INSERT INTO ${table_string} ${default_values_string}${returning_string}`
    }

    const columns_string = statement.columns
        .map(column => escape_identifier(dialect, column))
        .join(', ')

    const values_string = statement.values
        .map(row => `(${row.map(value => params.add(value)).join(', ')})`)
        .join(', ')

    return `INSERT INTO ${table_string} (${columns_string}) VALUES ${values_string}${returning_string}`
}
