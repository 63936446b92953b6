import { escape_identifier } from '../../helpers/escape'
import { CompilerArgs } from '../compiler'

export type ColumnReference = {
    readonly column: string
    readonly table?: string
}

export type Expression =
    | ColumnReference
    | { readonly param: unknown }
    | { readonly count: '*' }

export const compile_expression = ({
    statement,
    dialect,
    params,
}: CompilerArgs<Expression>): string => {
    if ('column' in statement) {
        const column = escape_identifier(dialect, statement.column)
        return statement.table === undefined
            ? column
            : `${escape_identifier(dialect, statement.table)}.${column}`
    }

    if ('param' in statement) {
        return params.add(statement.param)
    }

    return 'COUNT(*)'
}
