import { escape_identifier } from '../../helpers/escape'
import { CompilerArgs } from '../compiler'
import { compile_where, Where } from '../query/compile_where'

export type Delete = {
    readonly delete_from: string
    readonly where?: Where
}

export const compile_delete = ({
    statement,
    dialect,
    params,
}: CompilerArgs<Delete>): string => {
    const where_string = statement.where
        ? ` WHERE ${compile_where({
              statement: statement.where,
              dialect,
              params,
          })}`
        : ''

    return `DELETE FROM ${escape_identifier(
        dialect,
        statement.delete_from
    )}${where_string}`
}
