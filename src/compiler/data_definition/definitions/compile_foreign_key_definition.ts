import { escape_identifier } from '../../../helpers/escape'
import { OnDelete } from '../../../schema/field_types'
import { CompilerArgs } from '../../compiler'

export type ForeignKeyDefinition = {
    readonly constraint: 'foreign_key'
    readonly columns: readonly string[]
    readonly referenced_table: string
    readonly referenced_columns: readonly string[]
    readonly on_delete?: OnDelete
}

const on_delete_strings: Record<OnDelete, string> = {
    cascade: 'CASCADE',
    restrict: 'RESTRICT',
    set_null: 'SET NULL',
}

export const compile_foreign_key_definition = ({
    statement,
    dialect,
}: CompilerArgs<ForeignKeyDefinition>) => {
    const columns_string = statement.columns
        .map(column => escape_identifier(dialect, column))
        .join(', ')

    const referenced_columns_string = statement.referenced_columns
        .map(column => escape_identifier(dialect, column))
        .join(', ')

    const on_delete_string = statement.on_delete
        ? ` ON DELETE ${on_delete_strings[statement.on_delete]}`
        : ''

    return `FOREIGN KEY (${columns_string}) REFERENCES ${escape_identifier(
        dialect,
        statement.referenced_table
    )} (${referenced_columns_string})${on_delete_string}`
}
