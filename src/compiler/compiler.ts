import { Dialect } from '../types'
import {
    compile_create_table,
    CreateTable,
} from './data_definition/create_table/compile_create_table'
import { compile_delete, Delete } from './mutate/compile_delete'
import { compile_insert_into, InsertInto } from './mutate/compile_insert_into'
import { compile_update, Update } from './mutate/compile_update'
import { compile_select, Select } from './query/compile_select'

export type Statement = Select | InsertInto | Update | Delete | CreateTable

export type CompiledStatement = {
    readonly sql_string: string
    readonly params: readonly unknown[]
}

/**
 * Collects bound params while a statement compiles and hands out the placeholder for each one
 */
export class ParamCollector {
    readonly params: unknown[] = []

    constructor(readonly dialect: Dialect) {}

    add(value: unknown) {
        this.params.push(value)
        return this.dialect === 'postgres' ? `$${this.params.length}` : '?'
    }
}

export type CompilerArgs<T> = {
    statement: T
    dialect: Dialect
    params: ParamCollector
}

export const compile_statement = (
    statement: Statement,
    dialect: Dialect
): CompiledStatement => {
    const params = new ParamCollector(dialect)
    const sql_string = compile_statement_string({ statement, dialect, params })
    return { sql_string, params: params.params }
}

const compile_statement_string = ({
    statement,
    dialect,
    params,
}: CompilerArgs<Statement>) => {
    if ('select' in statement) {
        return compile_select({ statement, dialect, params })
    }

    if ('insert_into' in statement) {
        return compile_insert_into({ statement, dialect, params })
    }

    if ('update' in statement) {
        return compile_update({ statement, dialect, params })
    }

    if ('delete_from' in statement) {
        return compile_delete({ statement, dialect, params })
    }

    return compile_create_table({ statement, dialect, params })
}
