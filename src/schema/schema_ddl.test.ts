import { expect } from 'chai'
import { describe, test } from 'mocha'
import { compile_statement } from '../compiler/compiler'
import { ConfigurationError } from '../helpers/error_handling'
import { get_test_registry } from '../test_data/test_models'
import { fields, relations } from './field_types'
import { ModelRegistry } from './model_registry'
import { get_create_table_statements } from './schema_ddl'

describe(get_create_table_statements.name, () => {
    const registry = get_test_registry({ book_author_on_delete: 'cascade' })
    const statements = get_create_table_statements(registry)
    const tables = statements.map(statement => statement.create_table)

    test('creates referenced tables first', () => {
        expect(tables.indexOf('publishers')).to.be.lessThan(
            tables.indexOf('authors')
        )
        expect(tables.indexOf('authors')).to.be.lessThan(tables.indexOf('books'))
        expect(tables.indexOf('authors')).to.be.lessThan(
            tables.indexOf('profiles')
        )
        expect(tables.indexOf('books')).to.be.lessThan(
            tables.indexOf('books_tags')
        )
        expect(tables.indexOf('tags')).to.be.lessThan(
            tables.indexOf('books_tags')
        )
        expect(tables).to.include('categories')
    })
    test('compiles associative tables with their constraints', () => {
        const books_tags = statements.find(
            statement => statement.create_table === 'books_tags'
        )
        expect(books_tags).to.not.equal(undefined)
        if (!books_tags) return

        expect(compile_statement(books_tags, 'sqlite').sql_string).to.equal(
            'CREATE TABLE `books_tags` (`id` INTEGER NOT NULL PRIMARY KEY AUTOINCREMENT, ' +
                '`book_id` INTEGER NOT NULL, `tag_id` INTEGER NOT NULL, ' +
                'UNIQUE (`book_id`, `tag_id`), ' +
                'FOREIGN KEY (`book_id`) REFERENCES `books` (`id`) ON DELETE CASCADE, ' +
                'FOREIGN KEY (`tag_id`) REFERENCES `tags` (`id`) ON DELETE CASCADE)'
        )
    })
    test('carries on_delete and self references', () => {
        const compiled = statements.map(
            statement => compile_statement(statement, 'sqlite').sql_string
        )

        expect(compiled).to.include.members([
            'CREATE TABLE `tags` (`id` INTEGER NOT NULL PRIMARY KEY AUTOINCREMENT, ' +
                '`name` VARCHAR(255) NOT NULL UNIQUE)',
        ])
        const books = compiled.find(sql => sql.startsWith('CREATE TABLE `books`'))
        expect(books).to.contain(
            'FOREIGN KEY (`author_id`) REFERENCES `authors` (`id`) ON DELETE CASCADE'
        )
        const categories = compiled.find(sql =>
            sql.startsWith('CREATE TABLE `categories`')
        )
        expect(categories).to.contain(
            'FOREIGN KEY (`parent_id`) REFERENCES `categories` (`id`)'
        )
    })
    test('uses identity columns on postgres', () => {
        const tags = statements.find(
            statement => statement.create_table === 'tags'
        )
        if (!tags) throw new Error('no tags table')

        expect(
            compile_statement(
                { ...tags, if_not_exists: true },
                'postgres'
            ).sql_string
        ).to.equal(
            'CREATE TABLE IF NOT EXISTS "tags" ("id" INTEGER GENERATED BY DEFAULT AS IDENTITY NOT NULL PRIMARY KEY, ' +
                '"name" VARCHAR(255) NOT NULL UNIQUE)'
        )
    })
    test('rejects foreign key cycles', () => {
        const cyclic = new ModelRegistry()
        cyclic.register_model({
            name: 'Egg',
            fields: { id: fields.integer({ primary_key: true }) },
            relations: { hen: relations.foreign_key('Hen') },
        })
        cyclic.register_model({
            name: 'Hen',
            fields: { id: fields.integer({ primary_key: true }) },
            relations: { egg: relations.foreign_key('Egg') },
        })

        expect(() => get_create_table_statements(cyclic)).to.throw(
            ConfigurationError,
            'Cannot order table creation'
        )
    })
})
