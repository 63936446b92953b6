import type { Database as SqlJsDatabase, SqlValue } from 'sql.js'
import { CompiledStatement } from '../compiler/compiler'
import { Dialect, Row } from '../types'
import { QueryExecutionError } from './error_handling'
import { format_statement } from './escape'
import { Logger } from './logger'

export type RunResult = {
    affected_rows: number
    /**
     * Generated key of the last inserted row, for drivers that report one
     */
    insert_id?: number | bigint | string
    /**
     * Rows returned by a RETURNING clause
     */
    rows?: Row[]
}

/**
 * The seam between tessera and a database client. Adapters for sql.js, mysql2 and pg are below, anything else
 * only needs to implement these three methods.
 */
export type Driver = {
    readonly dialect: Dialect
    /**
     * Runs read statements and returns the rows of each one, in the same order
     */
    query(statements: readonly CompiledStatement[]): Promise<Row[][]>
    run(statement: CompiledStatement): Promise<RunResult>
    /**
     * Runs fn inside a transaction, committing if it resolves and rolling back if it rejects. The driver handed
     * to fn must be used for every statement of the transaction.
     */
    transaction<T>(fn: (driver: Driver) => Promise<T>): Promise<T>
}

const is_row = (value: unknown): value is Row =>
    typeof value === 'object' && value !== null && !Array.isArray(value)

const to_rows = (value: unknown): Row[] =>
    Array.isArray(value) ? value.filter(is_row) : []

/**
 * Runs fn between BEGIN and COMMIT, or ROLLBACK if fn fails. The rollback error, if any, is attached to the
 * original error instead of replacing it.
 */
const run_in_transaction = async <T>(
    execute: (sql: string) => Promise<unknown>,
    fn: () => Promise<T>
): Promise<T> => {
    await execute('BEGIN')
    try {
        const result = await fn()
        await execute('COMMIT')
        return result
    } catch (error) {
        await execute('ROLLBACK').catch(rollback_error => {
            throw new AggregateError(
                [error, rollback_error],
                'Rollback failed after a failed transaction'
            )
        })
        throw error
    }
}

/**
 * Wraps a driver so that the transaction's own driver is handed to nested transaction calls instead of opening
 * a second transaction
 */
const in_transaction_driver = (driver: Driver): Driver => ({
    dialect: driver.dialect,
    query: statements => driver.query(statements),
    run: statement => driver.run(statement),
    transaction: fn => fn(in_transaction_driver(driver)),
})

const to_sqljs_value = (value: unknown): SqlValue => {
    if (
        value === null ||
        typeof value === 'number' ||
        typeof value === 'string' ||
        value instanceof Uint8Array
    ) {
        return value
    }
    if (value === undefined) {
        return null
    }
    if (typeof value === 'boolean') {
        return value ? 1 : 0
    }
    if (typeof value === 'bigint') {
        return Number(value)
    }
    if (value instanceof Date) {
        return value.toISOString()
    }

    throw new QueryExecutionError(
        `Cannot bind a value of type ${typeof value} to a sqlite statement.`
    )
}

/**
 * Adapter for a sql.js database. sql.js is synchronous, so every statement has finished by the time the next
 * one starts.
 */
export const sqljs_adapter = (connection: SqlJsDatabase): Driver => {
    const all = ({ sql_string, params }: CompiledStatement): Row[] => {
        const prepared = connection.prepare(sql_string)
        try {
            prepared.bind(params.map(to_sqljs_value))
            const rows: Row[] = []
            while (prepared.step()) {
                rows.push(prepared.getAsObject())
            }
            return rows
        } finally {
            prepared.free()
        }
    }

    const run = ({ sql_string, params }: CompiledStatement): RunResult => {
        connection.run(sql_string, params.map(to_sqljs_value))
        const affected_rows = connection.getRowsModified()
        const [last_insert] = connection.exec('SELECT last_insert_rowid()')
        const insert_id = last_insert?.values[0]?.[0]

        return {
            affected_rows,
            insert_id: typeof insert_id === 'number' ? insert_id : undefined,
        }
    }

    const driver: Driver = {
        dialect: 'sqlite',
        query: async statements => statements.map(all),
        run: async statement => run(statement),
        transaction: fn =>
            run_in_transaction(
                async sql_string => run({ sql_string, params: [] }),
                () => fn(in_transaction_driver(driver))
            ),
    }

    return driver
}

/**
 * The parts of a mysql2/promise connection or pool the adapter uses
 */
export type Mysql2Connection = {
    query(sql: string, values?: unknown[]): Promise<[unknown, unknown]>
}

export type Mysql2Pool = Mysql2Connection & {
    getConnection(): Promise<Mysql2Connection & { release(): void }>
}

const get_mysql_run_result = (result: unknown): RunResult => {
    if (typeof result === 'object' && result !== null && 'affectedRows' in result) {
        const insert_id = 'insertId' in result ? result.insertId : undefined
        return {
            affected_rows: Number(result.affectedRows),
            insert_id:
                typeof insert_id === 'number' || typeof insert_id === 'bigint'
                    ? insert_id
                    : undefined,
        }
    }

    return { affected_rows: 0 }
}

export const mysql2_adapter = (
    connection: Mysql2Connection | Mysql2Pool
): Driver => {
    const create_driver = (executor: Mysql2Connection | Mysql2Pool): Driver => ({
        dialect: 'mysql',
        query: async statements => {
            const results = await Promise.all(
                statements.map(({ sql_string, params }) =>
                    executor.query(sql_string, [...params])
                )
            )
            return results.map(([rows]) => to_rows(rows))
        },
        run: async ({ sql_string, params }) => {
            const [result] = await executor.query(sql_string, [...params])
            return get_mysql_run_result(result)
        },
        transaction: async fn => {
            if (!('getConnection' in executor)) {
                // a single connection is already exclusive
                return run_in_transaction(
                    sql => executor.query(sql),
                    () => fn(in_transaction_driver(create_driver(executor)))
                )
            }

            const transaction_connection = await executor.getConnection()
            try {
                return await run_in_transaction(
                    sql => transaction_connection.query(sql),
                    () =>
                        fn(
                            in_transaction_driver(
                                create_driver(transaction_connection)
                            )
                        )
                )
            } finally {
                transaction_connection.release()
            }
        },
    })

    return create_driver(connection)
}

/**
 * The parts of a pg pool (and the clients it hands out) the adapter uses
 */
export type PgClient = {
    query(
        sql: string,
        values?: unknown[]
    ): Promise<{ rows: unknown[]; rowCount: number | null }>
}

export type PgPool = PgClient & {
    connect(): Promise<PgClient & { release(): void }>
}

export const pg_adapter = (pool: PgPool): Driver => {
    const create_driver = (executor: PgClient): Driver => ({
        dialect: 'postgres',
        query: async statements => {
            const results = await Promise.all(
                statements.map(({ sql_string, params }) =>
                    executor.query(sql_string, [...params])
                )
            )
            return results.map(({ rows }) => to_rows(rows))
        },
        run: async ({ sql_string, params }) => {
            const { rows, rowCount } = await executor.query(sql_string, [
                ...params,
            ])
            return { affected_rows: rowCount ?? 0, rows: to_rows(rows) }
        },
        transaction: async fn => {
            // statements of a transaction must share one client, so one is checked out of the pool for it
            const client = await pool.connect()
            try {
                return await run_in_transaction(
                    sql => client.query(sql),
                    () => fn(in_transaction_driver(create_driver(client)))
                )
            } finally {
                client.release()
            }
        },
    })

    return create_driver(pool)
}

/**
 * Logs every statement at debug level before handing it to the driver
 */
export const with_statement_logging = (
    driver: Driver,
    logger: Logger
): Driver => {
    const log_statement = ({ sql_string, params }: CompiledStatement) =>
        logger.debug(
            { sql: format_statement(driver.dialect, sql_string, params) },
            'executing statement'
        )

    return {
        dialect: driver.dialect,
        query: statements => {
            statements.forEach(log_statement)
            return driver.query(statements)
        },
        run: statement => {
            log_statement(statement)
            return driver.run(statement)
        },
        transaction: fn =>
            driver.transaction(transaction_driver =>
                fn(with_statement_logging(transaction_driver, logger))
            ),
    }
}
