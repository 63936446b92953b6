import { LogicalType } from '../../../schema/field_types'
import { Dialect } from '../../../types'
import { ColumnDefinition } from './compile_column_definition'

const data_types: Record<LogicalType, Record<Dialect, string>> = {
    string: { sqlite: 'VARCHAR', mysql: 'VARCHAR', postgres: 'VARCHAR' },
    text: { sqlite: 'TEXT', mysql: 'TEXT', postgres: 'TEXT' },
    // sqlite only makes a primary key auto increment when the type is exactly INTEGER
    integer: { sqlite: 'INTEGER', mysql: 'INT', postgres: 'INTEGER' },
    float: { sqlite: 'REAL', mysql: 'DOUBLE', postgres: 'DOUBLE PRECISION' },
    decimal: { sqlite: 'DECIMAL', mysql: 'DECIMAL', postgres: 'DECIMAL' },
    boolean: { sqlite: 'BOOLEAN', mysql: 'BOOLEAN', postgres: 'BOOLEAN' },
    date: { sqlite: 'TEXT', mysql: 'DATE', postgres: 'DATE' },
    datetime: { sqlite: 'TEXT', mysql: 'DATETIME(3)', postgres: 'TIMESTAMP' },
    json: { sqlite: 'TEXT', mysql: 'JSON', postgres: 'JSONB' },
}

export const compile_data_type = (
    statement: ColumnDefinition,
    dialect: Dialect
) => {
    const data_type_string = data_types[statement.data_type][dialect]

    const data_type_args =
        statement.data_type === 'string'
            ? [statement.max_length]
            : statement.data_type === 'decimal'
            ? [statement.precision, statement.scale]
            : []
    const defined_args = data_type_args.filter(el => el !== undefined)

    return defined_args.length > 0
        ? `${data_type_string}(${defined_args.join(', ')})`
        : data_type_string
}
