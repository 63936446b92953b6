import { CompilerArgs } from '../../compiler'
import {
    ColumnDefinition,
    compile_column_definition,
} from './compile_column_definition'
import {
    compile_foreign_key_definition,
    ForeignKeyDefinition,
} from './compile_foreign_key_definition'
import {
    compile_primary_key_definition,
    PrimaryKeyDefinition,
} from './compile_primary_key_definition'
import {
    compile_unique_key_definition,
    UniqueKeyDefinition,
} from './compile_unique_key_definition'

export type Definition =
    | ColumnDefinition
    | PrimaryKeyDefinition
    | UniqueKeyDefinition
    | ForeignKeyDefinition

export const compile_definition = ({
    statement,
    dialect,
    params,
}: CompilerArgs<Definition>) => {
    if (!('constraint' in statement)) {
        return compile_column_definition({ statement, dialect, params })
    }

    if (statement.constraint === 'primary_key') {
        return compile_primary_key_definition({ statement, dialect, params })
    }

    if (statement.constraint === 'unique_key') {
        return compile_unique_key_definition({ statement, dialect, params })
    }

    return compile_foreign_key_definition({ statement, dialect, params })
}
