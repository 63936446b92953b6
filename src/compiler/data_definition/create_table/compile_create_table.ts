import { escape_identifier } from '../../../helpers/escape'
import { CompilerArgs } from '../../compiler'
import {
    compile_definition,
    Definition,
} from '../definitions/compile_definition'

export type CreateTable = {
    readonly create_table: string
    readonly if_not_exists?: boolean
    readonly definitions: readonly Definition[]
}

export const compile_create_table = ({
    statement,
    dialect,
    params,
}: CompilerArgs<CreateTable>) => {
    const if_not_exists_string = statement.if_not_exists
        ? ' IF NOT EXISTS'
        : ''

    const definitions_strings = statement.definitions.map(definition =>
        compile_definition({ statement: definition, dialect, params })
    )

    return `CREATE TABLE${if_not_exists_string} ${escape_identifier(
        dialect,
        statement.create_table
    )} (${definitions_strings.join(', ')})`
}
