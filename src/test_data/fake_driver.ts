import { CompiledStatement } from '../compiler/compiler'
import { default_config, TesseraConfig } from '../config/config'
import { Driver, RunResult } from '../helpers/database_adapters'
import { create_logger } from '../helpers/logger'
import { HookRegistry } from '../mutate/hooks'
import { SaveContext } from '../mutate/save'
import { ModelRegistry } from '../schema/model_registry'
import { Dialect, Row } from '../types'

export type FakeDriver = Driver & {
    /**
     * Statements of every query call, one array per call
     */
    readonly query_calls: CompiledStatement[][]
    readonly run_calls: CompiledStatement[]
}

/**
 * An in process driver for unit tests. Rows come from the given handler, and every call is recorded.
 */
export const create_fake_driver = ({
    dialect = 'sqlite',
    on_query = () => [],
    on_run = () => ({ affected_rows: 1 }),
}: {
    dialect?: Dialect
    on_query?: (statement: CompiledStatement) => Row[] | Promise<Row[]>
    on_run?: (statement: CompiledStatement) => RunResult | Promise<RunResult>
} = {}): FakeDriver => {
    const query_calls: CompiledStatement[][] = []
    const run_calls: CompiledStatement[] = []

    const driver: FakeDriver = {
        dialect,
        query_calls,
        run_calls,
        query: async statements => {
            query_calls.push([...statements])
            return Promise.all(statements.map(on_query))
        },
        run: async statement => {
            run_calls.push(statement)
            return on_run(statement)
        },
        transaction: fn => fn(driver),
    }

    return driver
}

/**
 * A driver that fails every call, for code that must not reach the database
 */
export const create_failing_driver = (): Driver => {
    const fail = () => Promise.reject(new Error('the database was called'))
    return {
        dialect: 'sqlite',
        query: fail,
        run: fail,
        transaction: fail,
    }
}

export const get_test_context = (
    registry: ModelRegistry,
    driver: Driver,
    config: Partial<TesseraConfig> = {}
): SaveContext => {
    const full_config = { ...default_config, log_level: 'silent' as const, ...config }
    return {
        registry,
        driver,
        logger: create_logger(full_config),
        config: full_config,
        hooks: new HookRegistry(),
    }
}
