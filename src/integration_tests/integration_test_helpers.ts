import initSqlJs, { Database as SqlJsDatabase } from 'sql.js'
import { TesseraConfig } from '../config/config'
import { Database } from '../database'
import { sqljs_adapter } from '../helpers/database_adapters'
import { get_test_registry, TestModelOptions } from '../test_data/test_models'

export const open_sqlite_database = async () => {
    const SQL = await initSqlJs()
    return new SQL.Database()
}

export const close_sqlite_database = async (db: SqlJsDatabase) => {
    db.close()
}

export type TestDatabase = {
    database: Database
    connection: SqlJsDatabase
}

/**
 * A fresh in memory database with every test model's table created. Foreign keys are enforced, which sqlite
 * only does when asked to.
 */
export const set_up_test_database = async (
    options: TestModelOptions = {},
    config: Partial<TesseraConfig> = {}
): Promise<TestDatabase> => {
    const connection = await open_sqlite_database()
    connection.run('PRAGMA foreign_keys = ON')

    const database = new Database({
        registry: get_test_registry(options),
        driver: sqljs_adapter(connection),
        config: { log_level: 'silent', ...config },
    })
    await database.create_tables()

    return { database, connection }
}

/**
 * Two publishers, three authors and their books, with a few tags
 */
export const seed_library = async (database: Database) => {
    const orbit = await database.create('Publisher', { name: 'Orbit' })
    const tor = await database.create('Publisher', { name: 'Tor' })

    const ada = await database.create('Author', {
        name: 'Ada',
        born_on: '1970-01-02',
        publisher_id: orbit.id,
    })
    const ben = await database.create('Author', {
        name: 'Ben',
        publisher_id: tor.id,
    })
    const cy = await database.create('Author', { name: 'Cy' })

    const fantasy = await database.create('Tag', { name: 'fantasy' })
    const space = await database.create('Tag', { name: 'space' })

    await database.create_with_related('Book', {
        title: 'Alpha',
        pages: 120,
        author_id: ada.id,
        tags: [fantasy, space],
    })
    await database.create_with_related('Book', {
        title: 'Beta',
        pages: 300,
        status: 'published',
        author_id: ada.id,
        tags: [space],
    })
    await database.create('Book', {
        title: 'Gamma',
        pages: 80,
        status: 'published',
        author_id: ben.id,
    })

    return { orbit, tor, ada, ben, cy, fantasy, space }
}
