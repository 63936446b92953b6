import { escape_identifier } from '../../../helpers/escape'
import { CompilerArgs } from '../../compiler'

export type PrimaryKeyDefinition = {
    readonly constraint: 'primary_key'
    readonly columns: readonly string[]
}

export const compile_primary_key_definition = ({
    statement,
    dialect,
}: CompilerArgs<PrimaryKeyDefinition>) =>
    `PRIMARY KEY (${statement.columns
        .map(column => escape_identifier(dialect, column))
        .join(', ')})`
