import { escape_identifier } from '../../helpers/escape'
import { CompilerArgs } from '../compiler'
import { compile_where, Where } from '../query/compile_where'

export type Update = {
    readonly update: string
    readonly set: readonly { readonly column: string; readonly value: unknown }[]
    readonly where?: Where
}

export const compile_update = ({
    statement,
    dialect,
    params,
}: CompilerArgs<Update>): string => {
    const set_string = statement.set
        .map(
            ({ column, value }) =>
                `${escape_identifier(dialect, column)} = ${params.add(value)}`
        )
        .join(', ')

    const where_string = statement.where
        ? ` WHERE ${compile_where({
              statement: statement.where,
              dialect,
              params,
          })}`
        : ''

    return `UPDATE ${escape_identifier(
        dialect,
        statement.update
    )} SET ${set_string}${where_string}`
}
