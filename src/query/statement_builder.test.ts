import { expect } from 'chai'
import { describe, test } from 'mocha'
import { compile_statement } from '../compiler/compiler'
import { get_test_registry } from '../test_data/test_models'
import { build_load_plan } from './load_plan'
import { get_empty_query_spec, QuerySpec } from './query_types'
import {
    build_count_select,
    build_key_select,
    build_prefetch_select,
    build_root_select,
} from './statement_builder'

describe('statement_builder.ts', () => {
    const registry = get_test_registry()
    const get_spec = (model: string, changes: Partial<QuerySpec>): QuerySpec => ({
        ...get_empty_query_spec(model),
        ...changes,
    })
    const compile_root = (spec: QuerySpec) =>
        compile_statement(
            build_root_select(
                registry,
                spec,
                build_load_plan(registry, spec),
                'sqlite'
            ),
            'sqlite'
        )

    describe(build_root_select.name, () => {
        test('joins select_related models and filters on them', () => {
            const { sql_string, params } = compile_root(
                get_spec('Book', {
                    only: ['title', 'author.name'],
                    select_related: [['author']],
                    where: { $eq: ['author.name', 'X'] },
                    order_by: [{ path: ['title'], direction: 'asc' }],
                    limit: 10,
                })
            )

            expect(sql_string).to.equal(
                'SELECT `t0`.`id` AS `id`, `t0`.`title` AS `title`, `t_author`.`id` AS `author__id`, ' +
                    '`t_author`.`name` AS `author__name` FROM `books` `t0` ' +
                    'LEFT JOIN `authors` `t_author` ON `t_author`.`id` = `t0`.`author_id` ' +
                    'WHERE `t_author`.`name` = ? ORDER BY `t0`.`title` ASC LIMIT ?'
            )
            expect(params).to.deep.equal(['X', 10])
        })
        test('filters through to-many relations with subqueries', () => {
            const { sql_string, params } = compile_root(
                get_spec('Author', {
                    only: ['name'],
                    where: { $contains: ['books.title', '50%_off!'] },
                })
            )

            expect(sql_string).to.equal(
                'SELECT `t0`.`id` AS `id`, `t0`.`name` AS `name` FROM `authors` `t0` ' +
                    'WHERE `t0`.`id` IN (SELECT `s1`.`author_id` FROM `books` `s1` ' +
                    "WHERE (`s1`.`title` LIKE ? ESCAPE '!') AND (`s1`.`author_id` IS NOT NULL))"
            )
            expect(params).to.deep.equal(['%50!%!_off!!%'])
        })
        test('filters through many-to-many relations with the associative table', () => {
            const { sql_string, params } = compile_root(
                get_spec('Book', {
                    only: ['title'],
                    where: { $eq: ['tags.name', 'sci-fi'] },
                })
            )

            expect(sql_string).to.equal(
                'SELECT `t0`.`id` AS `id`, `t0`.`title` AS `title` FROM `books` `t0` ' +
                    'WHERE `t0`.`id` IN (SELECT `s2`.`book_id` FROM `books_tags` `s2` ' +
                    'INNER JOIN `tags` `s1` ON `s1`.`id` = `s2`.`tag_id` ' +
                    'WHERE (`s1`.`name` = ?) AND (`s2`.`book_id` IS NOT NULL))'
            )
            expect(params).to.deep.equal(['sci-fi'])
        })
        test('compiles null comparisons and combinators', () => {
            const { sql_string, params } = compile_root(
                get_spec('Book', {
                    only: ['title'],
                    where: {
                        $or: [
                            { $eq: ['pages', null] },
                            { $not: { $in: ['status', ['draft']] } },
                        ],
                    },
                })
            )

            expect(sql_string).to.equal(
                'SELECT `t0`.`id` AS `id`, `t0`.`title` AS `title` FROM `books` `t0` ' +
                    'WHERE (`t0`.`pages` IS NULL) OR (NOT (`t0`.`status` IN (?)))'
            )
            expect(params).to.deep.equal(['draft'])
        })
        test('serializes filter values for the dialect', () => {
            const { params } = compile_root(
                get_spec('Book', {
                    where: {
                        $and: [
                            { $eq: ['in_print', true] },
                            { $gt: ['pages', 100] },
                        ],
                    },
                })
            )

            expect(params).to.deep.equal([1, 100])
        })
        test('rejects ordering through to-many relations', () => {
            expect(() =>
                compile_root(
                    get_spec('Book', {
                        order_by: [{ path: ['tags', 'name'], direction: 'asc' }],
                    })
                )
            ).to.throw('Cannot order Book by tags.name: tags is a to-many relation.')
        })
    })

    describe(build_count_select.name, () => {
        test('counts with the joins the filter needs', () => {
            const { sql_string, params } = compile_statement(
                build_count_select(
                    registry,
                    get_spec('Book', { where: { $eq: ['author.name', 'X'] } }),
                    'sqlite'
                ),
                'sqlite'
            )

            expect(sql_string).to.equal(
                'SELECT COUNT(*) AS `count` FROM `books` `t0` ' +
                    'LEFT JOIN `authors` `t_author` ON `t_author`.`id` = `t0`.`author_id` ' +
                    'WHERE `t_author`.`name` = ?'
            )
            expect(params).to.deep.equal(['X'])
        })
    })

    describe(build_key_select.name, () => {
        test('orders by joined columns on postgres', () => {
            const { sql_string, params } = compile_statement(
                build_key_select(
                    registry,
                    get_spec('Book', {
                        order_by: [
                            { path: ['author', 'name'], direction: 'desc' },
                        ],
                        offset: 5,
                    }),
                    'postgres'
                ),
                'postgres'
            )

            expect(sql_string).to.equal(
                'SELECT "t0"."id" AS "id" FROM "books" "t0" ' +
                    'LEFT JOIN "authors" "t_author" ON "t_author"."id" = "t0"."author_id" ' +
                    'ORDER BY "t_author"."name" DESC LIMIT ALL OFFSET $1'
            )
            expect(params).to.deep.equal([5])
        })
    })

    describe(build_prefetch_select.name, () => {
        test('selects children by their foreign key', () => {
            const spec = get_spec('Author', {
                only: ['books.title'],
                prefetch_related: [['books']],
            })
            const [books] = build_load_plan(registry, spec).prefetch_tiers[0]
            const { sql_string, params } = compile_statement(
                build_prefetch_select(registry, books, [1, 2]),
                'sqlite'
            )

            expect(sql_string).to.equal(
                'SELECT `t0`.`id` AS `id`, `t0`.`title` AS `title`, `t0`.`author_id` AS `__parent_key` ' +
                    'FROM `books` `t0` WHERE `t0`.`author_id` IN (?, ?) ORDER BY `t0`.`id` ASC'
            )
            expect(params).to.deep.equal([1, 2])
        })
        test('selects many-to-many targets through the associative table', () => {
            const spec = get_spec('Book', {
                only: ['tags.name'],
                prefetch_related: [['tags']],
            })
            const [tags] = build_load_plan(registry, spec).prefetch_tiers[0]
            const { sql_string, params } = compile_statement(
                build_prefetch_select(registry, tags, [7]),
                'sqlite'
            )

            expect(sql_string).to.equal(
                'SELECT `t0`.`id` AS `id`, `t0`.`name` AS `name`, `t_through`.`book_id` AS `__parent_key` ' +
                    'FROM `tags` `t0` INNER JOIN `books_tags` `t_through` ON `t_through`.`tag_id` = `t0`.`id` ' +
                    'WHERE `t_through`.`book_id` IN (?) ORDER BY `t0`.`id` ASC'
            )
            expect(params).to.deep.equal([7])
        })
    })
})
