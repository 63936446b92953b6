import { expect } from 'chai'
import { describe, test } from 'mocha'
import { format } from 'sql-formatter'
import { compile_statement } from './compiler'

const format_sqlite = (sql: string) => format(sql, { language: 'sqlite' })
const format_postgres = (sql: string) =>
    format(sql, { language: 'postgresql' })

describe('compiler.ts', () => {
    describe('select', () => {
        test('compiles joins, filters, ordering and pagination', () => {
            const { sql_string, params } = compile_statement(
                {
                    select: [
                        { expression: { table: 't0', column: 'id' }, as: 'id' },
                        {
                            expression: { table: 't_author', column: 'name' },
                            as: 'author__name',
                        },
                    ],
                    from: { table: 'books', as: 't0' },
                    joins: [
                        {
                            type: 'left',
                            table: 'authors',
                            as: 't_author',
                            on: {
                                eq: [
                                    { table: 't_author', column: 'id' },
                                    { table: 't0', column: 'author_id' },
                                ],
                            },
                        },
                    ],
                    where: {
                        and: [
                            {
                                eq: [
                                    { table: 't_author', column: 'name' },
                                    { param: 'X' },
                                ],
                            },
                            { not: { is_null: { table: 't0', column: 'pages' } } },
                        ],
                    },
                    order_by: [
                        {
                            expression: { table: 't0', column: 'id' },
                            direction: 'desc',
                        },
                    ],
                    limit: 10,
                    offset: 20,
                },
                'sqlite'
            )

            expect(format_sqlite(sql_string)).to.equal(
                format_sqlite(
                    'SELECT `t0`.`id` AS `id`, `t_author`.`name` AS `author__name` FROM `books` `t0` ' +
                        'LEFT JOIN `authors` `t_author` ON `t_author`.`id` = `t0`.`author_id` ' +
                        'WHERE (`t_author`.`name` = ?) AND (NOT (`t0`.`pages` IS NULL)) ' +
                        'ORDER BY `t0`.`id` DESC LIMIT ? OFFSET ?'
                )
            )
            expect(params).to.deep.equal(['X', 10, 20])
        })
        test('compiles subqueries inside in clauses', () => {
            const { sql_string, params } = compile_statement(
                {
                    select: [{ expression: { column: 'id' } }],
                    from: { table: 'authors' },
                    where: {
                        in: [
                            { column: 'id' },
                            {
                                select: [{ expression: { column: 'author_id' } }],
                                from: { table: 'books' },
                                where: {
                                    like: [{ column: 'title' }, { param: '%a!%%' }],
                                    escape: '!',
                                },
                            },
                        ],
                    },
                },
                'sqlite'
            )

            expect(sql_string).to.equal(
                "SELECT `id` FROM `authors` WHERE `id` IN (SELECT `author_id` FROM `books` WHERE `title` LIKE ? ESCAPE '!')"
            )
            expect(params).to.deep.equal(['%a!%%'])
        })
        test('compiles an empty in list to a false condition', () => {
            const { sql_string } = compile_statement(
                {
                    select: [{ expression: { count: '*' }, as: 'count' }],
                    from: { table: 'authors' },
                    where: { in: [{ column: 'id' }, []] },
                },
                'mysql'
            )

            expect(sql_string).to.equal(
                'SELECT COUNT(*) AS `count` FROM `authors` WHERE 1 = 0'
            )
        })
        test('adds an unbounded limit when only an offset is given', () => {
            const statement = {
                select: [{ expression: { column: 'id' } }],
                from: { table: 'authors' },
                offset: 5,
            }

            expect(compile_statement(statement, 'sqlite').sql_string).to.equal(
                'SELECT `id` FROM `authors` LIMIT -1 OFFSET ?'
            )
            expect(compile_statement(statement, 'postgres').sql_string).to.equal(
                'SELECT "id" FROM "authors" LIMIT ALL OFFSET $1'
            )
        })
        test('numbers postgres placeholders', () => {
            const { sql_string, params } = compile_statement(
                {
                    select: [{ expression: { column: 'id' } }],
                    from: { table: 'authors' },
                    where: {
                        or: [
                            { eq: [{ column: 'name' }, { param: 'a' }] },
                            {
                                in: [
                                    { column: 'id' },
                                    [{ param: 1 }, { param: 2 }],
                                ],
                            },
                        ],
                    },
                },
                'postgres'
            )

            expect(format_postgres(sql_string)).to.equal(
                format_postgres(
                    'SELECT "id" FROM "authors" WHERE ("name" = $1) OR ("id" IN ($2, $3))'
                )
            )
            expect(params).to.deep.equal(['a', 1, 2])
        })
    })

    describe('mutations', () => {
        test('compiles inserts', () => {
            const { sql_string, params } = compile_statement(
                {
                    insert_into: 'authors',
                    columns: ['name', 'born_on'],
                    values: [['X', null]],
                    returning: ['id'],
                },
                'postgres'
            )

            expect(sql_string).to.equal(
                'INSERT INTO "authors" ("name", "born_on") VALUES ($1, $2) RETURNING "id"'
            )
            expect(params).to.deep.equal(['X', null])
        })
        test('compiles inserts without columns', () => {
            const statement = { insert_into: 'tags', columns: [], values: [[]] }

            expect(compile_statement(statement, 'sqlite').sql_string).to.equal(
                'INSERT INTO `tags` DEFAULT VALUES'
            )
            expect(compile_statement(statement, 'mysql').sql_string).to.equal(
                'INSERT INTO `tags` () VALUES ()'
            )
        })
        test('compiles updates', () => {
            const { sql_string, params } = compile_statement(
                {
                    update: 'authors',
                    set: [{ column: 'name', value: 'Y' }],
                    where: { eq: [{ column: 'id' }, { param: 3 }] },
                },
                'mysql'
            )

            expect(sql_string).to.equal(
                'UPDATE `authors` SET `name` = ? WHERE `id` = ?'
            )
            expect(params).to.deep.equal(['Y', 3])
        })
        test('compiles deletes', () => {
            const { sql_string, params } = compile_statement(
                {
                    delete_from: 'authors',
                    where: { in: [{ column: 'id' }, [{ param: 3 }]] },
                },
                'sqlite'
            )

            expect(sql_string).to.equal('DELETE FROM `authors` WHERE `id` IN (?)')
            expect(params).to.deep.equal([3])
        })
    })

    describe('create table', () => {
        const statement = {
            create_table: 'books',
            definitions: [
                {
                    name: 'id',
                    data_type: 'integer',
                    not_null: true,
                    primary_key: true,
                    auto_increment: true,
                },
                {
                    name: 'title',
                    data_type: 'string',
                    max_length: 100,
                    not_null: true,
                    default: "it's",
                },
                {
                    name: 'price',
                    data_type: 'decimal',
                    precision: 10,
                    scale: 2,
                },
                { name: 'author_id', data_type: 'integer', not_null: true },
                { constraint: 'unique_key', columns: ['title', 'author_id'] },
                {
                    constraint: 'foreign_key',
                    columns: ['author_id'],
                    referenced_table: 'authors',
                    referenced_columns: ['id'],
                    on_delete: 'cascade',
                },
            ],
        } as const

        test('compiles for sqlite', () => {
            expect(compile_statement(statement, 'sqlite').sql_string).to.equal(
                'CREATE TABLE `books` (' +
                    '`id` INTEGER NOT NULL PRIMARY KEY AUTOINCREMENT, ' +
                    "`title` VARCHAR(100) NOT NULL DEFAULT 'it''s', " +
                    '`price` DECIMAL(10, 2), ' +
                    '`author_id` INTEGER NOT NULL, ' +
                    'UNIQUE (`title`, `author_id`), ' +
                    'FOREIGN KEY (`author_id`) REFERENCES `authors` (`id`) ON DELETE CASCADE)'
            )
        })
        test('compiles auto increment for mysql and postgres', () => {
            expect(
                compile_statement(statement, 'mysql').sql_string.split(', ')[0]
            ).to.equal('CREATE TABLE `books` (`id` INT NOT NULL AUTO_INCREMENT PRIMARY KEY')
            expect(
                compile_statement(statement, 'postgres').sql_string.split(', ')[0]
            ).to.equal(
                'CREATE TABLE "books" ("id" INTEGER GENERATED BY DEFAULT AS IDENTITY NOT NULL PRIMARY KEY'
            )
        })
    })
})
