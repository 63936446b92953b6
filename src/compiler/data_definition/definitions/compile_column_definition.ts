import { escape_identifier, escape_literal } from '../../../helpers/escape'
import { LogicalType, ServerDefault } from '../../../schema/field_types'
import { CompilerArgs } from '../../compiler'
import { compile_data_type } from './compile_data_type'

export type ColumnDefinition = {
    readonly name: string
    readonly data_type: LogicalType
    readonly max_length?: number
    readonly precision?: number
    readonly scale?: number
    readonly not_null?: boolean
    readonly auto_increment?: boolean
    /**
     * Inline primary key, for tables keyed by this column alone
     */
    readonly primary_key?: boolean
    readonly unique?: boolean
    readonly default?: ServerDefault
}

export const compile_column_definition = ({
    statement,
    dialect,
}: CompilerArgs<ColumnDefinition>) => {
    const auto_increment = statement.auto_increment === true

    const identity_string =
        auto_increment && dialect === 'postgres'
            ? ' GENERATED BY DEFAULT AS IDENTITY'
            : ''
    const not_null_string = statement.not_null ? ' NOT NULL' : ''
    const default_string =
        statement.default !== undefined
            ? ` DEFAULT ${escape_literal(dialect, statement.default)}`
            : ''
    const auto_increment_string =
        auto_increment && dialect === 'mysql' ? ' AUTO_INCREMENT' : ''
    const primary_key_string = statement.primary_key ? ' PRIMARY KEY' : ''
    const sqlite_auto_increment_string =
        auto_increment && statement.primary_key && dialect === 'sqlite'
            ? ' AUTOINCREMENT'
            : ''
    const unique_string = statement.unique ? ' UNIQUE' : ''

    return `${escape_identifier(dialect, statement.name)} ${compile_data_type(
        statement,
        dialect
    )}${identity_string}${not_null_string}${default_string}${auto_increment_string}${primary_key_string}${sqlite_auto_increment_string}${unique_string}`
}
