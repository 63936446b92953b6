import { compile_statement } from './compiler/compiler'
import { load_config, TesseraConfig } from './config/config'
import { Driver, with_statement_logging } from './helpers/database_adapters'
import { PersistenceError } from './helpers/error_handling'
import { create_logger, Logger } from './helpers/logger'
import { create_with_related } from './mutate/create_with_related'
import { Hook, HookEvent, HookRegistry } from './mutate/hooks'
import {
    delete_record,
    save_record,
    SaveContext,
    SaveOptions,
} from './mutate/save'
import { QuerySet } from './query/query_set'
import { QueryOptions } from './query/query_types'
import { ModelRegistry } from './schema/model_registry'
import { get_create_table_statements } from './schema/schema_ddl'
import { OrmRecord } from './types'

export type DatabaseOptions = {
    readonly registry: ModelRegistry
    readonly driver: Driver
    /**
     * Defaults to a pino logger built from the config
     */
    readonly logger?: Logger
    /**
     * Overrides on top of the defaults and TESSERA_* environment variables
     */
    readonly config?: Partial<TesseraConfig>
    readonly hooks?: HookRegistry
}

/**
 * Entry point tying a finalized model registry to a driver. Queries start from {@link Database.objects}, single
 * record writes go through save / create / delete.
 *
 * @example
 * const registry = new ModelRegistry()
 * registry.register_model({ name: 'Author', fields: { id: fields.integer({ primary_key: true }) } })
 * const db = new Database({ registry, driver: sqljs_adapter(connection) })
 * await db.create_tables()
 * const author = await db.create('Author', {})
 */
export class Database {
    readonly registry: ModelRegistry
    readonly driver: Driver
    readonly logger: Logger
    readonly config: TesseraConfig
    readonly hooks: HookRegistry
    private readonly unlogged_driver: Driver

    constructor(options: DatabaseOptions) {
        this.config = load_config(options.config)
        this.logger = options.logger ?? create_logger(this.config)
        this.registry = options.registry
        this.hooks = options.hooks ?? new HookRegistry()
        this.unlogged_driver = options.driver
        this.driver = with_statement_logging(options.driver, this.logger)

        // declarations are complete once a database uses them
        this.registry.finalize()
    }

    private get context(): SaveContext {
        return {
            registry: this.registry,
            driver: this.driver,
            logger: this.logger,
            config: this.config,
            hooks: this.hooks,
        }
    }

    objects(model_name: string) {
        return new QuerySet(this.context, model_name)
    }

    model(model_name: string) {
        return new ModelManager(this, model_name)
    }

    /**
     * Registers a lifecycle hook
     * @returns a function that removes the hook again
     */
    on(model_name: string, event: HookEvent, hook: Hook) {
        this.registry.get_model(model_name)
        return this.hooks.on(model_name, event, hook)
    }

    /**
     * Inserts the record if its primary key is unassigned, otherwise updates it. The record is updated in place
     * with defaults and generated keys.
     */
    async save(model_name: string, record: OrmRecord, options?: SaveOptions) {
        return save_record(this.context, model_name, record, options)
    }

    async create(
        model_name: string,
        values: OrmRecord,
        options?: Omit<SaveOptions, 'force_insert'>
    ) {
        return save_record(this.context, model_name, { ...values }, options)
    }

    /**
     * @returns the number of deleted rows
     */
    async delete(
        model_name: string,
        record: OrmRecord,
        options?: QueryOptions
    ) {
        return delete_record(this.context, model_name, record, options)
    }

    async create_with_related(
        model_name: string,
        tree: OrmRecord,
        options?: QueryOptions
    ) {
        return create_with_related(this.context, model_name, tree, options)
    }

    /**
     * Runs fn with a database whose statements all go through one driver transaction
     */
    async transaction<T>(fn: (database: Database) => Promise<T>): Promise<T> {
        return this.unlogged_driver.transaction(transaction_driver =>
            fn(
                new Database({
                    registry: this.registry,
                    driver: transaction_driver,
                    logger: this.logger,
                    config: this.config,
                    hooks: this.hooks,
                })
            )
        )
    }

    /**
     * Creates the tables of every registered model, referenced tables first
     */
    async create_tables({ if_not_exists = false } = {}) {
        const statements = get_create_table_statements(this.registry, {
            if_not_exists,
        })
        for (const statement of statements) {
            try {
                await this.driver.run(
                    compile_statement(statement, this.driver.dialect)
                )
            } catch (error) {
                throw new PersistenceError(
                    `Could not create table ${statement.create_table}: ${
                        error instanceof Error ? error.message : String(error)
                    }`,
                    { cause: error }
                )
            }
        }

        this.logger.info(
            { tables: statements.map(statement => statement.create_table) },
            'created tables'
        )
    }
}

/**
 * Shorthand for the operations of one model
 */
export class ModelManager {
    constructor(
        private readonly database: Database,
        readonly model_name: string
    ) {
        database.registry.get_model(model_name)
    }

    objects() {
        return this.database.objects(this.model_name)
    }

    save(record: OrmRecord, options?: SaveOptions) {
        return this.database.save(this.model_name, record, options)
    }

    create(values: OrmRecord, options?: Omit<SaveOptions, 'force_insert'>) {
        return this.database.create(this.model_name, values, options)
    }

    delete(record: OrmRecord, options?: QueryOptions) {
        return this.database.delete(this.model_name, record, options)
    }

    create_with_related(tree: OrmRecord, options?: QueryOptions) {
        return this.database.create_with_related(this.model_name, tree, options)
    }

    on(event: HookEvent, hook: Hook) {
        return this.database.on(this.model_name, event, hook)
    }
}
