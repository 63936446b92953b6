import { escape_identifier } from '../../../helpers/escape'
import { CompilerArgs } from '../../compiler'

export type UniqueKeyDefinition = {
    readonly constraint: 'unique_key'
    readonly name?: string
    readonly columns: readonly string[]
}

export const compile_unique_key_definition = ({
    statement,
    dialect,
}: CompilerArgs<UniqueKeyDefinition>) => {
    const name_string = statement.name
        ? `CONSTRAINT ${escape_identifier(dialect, statement.name)} `
        : ''

    return `${name_string}UNIQUE (${statement.columns
        .map(column => escape_identifier(dialect, column))
        .join(', ')})`
}
