import { expect } from 'chai'
import { describe, test } from 'mocha'
import {
    ConfigurationError,
    MultipleMatchesError,
    NoMatchError,
    UnknownRelationError,
} from '../helpers/error_handling'
import {
    create_failing_driver,
    create_fake_driver,
    get_test_context,
} from '../test_data/fake_driver'
import { get_test_registry } from '../test_data/test_models'
import { QuerySet } from './query_set'

describe('query_set.ts', () => {
    const registry = get_test_registry()
    const get_query_set = (model: string) =>
        new QuerySet(get_test_context(registry, create_failing_driver()), model)

    describe('builders', () => {
        test('never touch the database and never change the original', () => {
            const books = get_query_set('Book')
            const filtered = books
                .filter({ $eq: ['author.name', 'X'] })
                .filter({ $gt: ['pages', 10] })
                .exclude({ $eq: ['status', 'draft'] })
                .order_by('-pages')
                .select_related('author.publisher')
                .prefetch_related('tags')
                .only('title', 'author.name')
                .paginate(3, 20)

            expect(books.spec).to.deep.equal({
                model: 'Book',
                order_by: [],
                select_related: [],
                prefetch_related: [],
            })
            expect(filtered.spec).to.deep.equal({
                model: 'Book',
                where: {
                    $and: [
                        { $eq: ['author.name', 'X'] },
                        { $gt: ['pages', 10] },
                        { $not: { $eq: ['status', 'draft'] } },
                    ],
                },
                order_by: [{ path: ['pages'], direction: 'desc' }],
                select_related: [['author'], ['author', 'publisher']],
                prefetch_related: [['tags']],
                only: ['title', 'author.name'],
                limit: 20,
                offset: 40,
            })
        })
        test('validates paths eagerly', () => {
            const books = get_query_set('Book')

            expect(() => books.filter({ $eq: ['writer.name', 'X'] })).to.throw(
                UnknownRelationError,
                'Model Book has no relation named writer (in path writer.name).'
            )
            expect(() => books.order_by('colour')).to.throw(
                ConfigurationError,
                'Model Book has no field named colour (in path colour).'
            )
            expect(() => books.prefetch_related('tags.books.writer')).to.throw(
                UnknownRelationError
            )
        })
        test('rejects to-many relations in select_related', () => {
            expect(() => get_query_set('Author').select_related('books')).to.throw(
                ConfigurationError,
                'Cannot select_related books: books is a to-many relation.'
            )
        })
        test('rejects only together with exclude_fields', () => {
            expect(() =>
                get_query_set('Book').only('title').exclude_fields('pages')
            ).to.throw(ConfigurationError)
        })
        test('rejects negative pagination', () => {
            expect(() => get_query_set('Book').limit(-1)).to.throw(
                'limit must be a non negative integer, got -1.'
            )
            expect(() => get_query_set('Book').paginate(0, 10)).to.throw(
                'page must be a positive integer, got 0.'
            )
        })
        test('takes an explicit direction over the shorthand', () => {
            expect(get_query_set('Book').order_by('title', 'desc').spec.order_by).to.deep.equal([
                { path: ['title'], direction: 'desc' },
            ])
        })
    })

    describe('terminals', () => {
        const author_row = { id: 1, name: 'X', born_on: null, publisher_id: null }

        test('get fails without a match', async () => {
            const driver = create_fake_driver()
            const error = await new QuerySet(get_test_context(registry, driver), 'Author')
                .get({ $eq: ['name', 'X'] })
                .catch((error: unknown) => error)

            expect(error).to.be.instanceOf(NoMatchError)
        })
        test('get fails with more than one match', async () => {
            const driver = create_fake_driver({
                on_query: () => [author_row, { ...author_row, id: 2 }],
            })
            const error = await new QuerySet(get_test_context(registry, driver), 'Author')
                .get()
                .catch((error: unknown) => error)

            expect(error).to.be.instanceOf(MultipleMatchesError)
            expect(driver.query_calls[0][0].params).to.deep.equal([2])
        })
        test('first orders by primary key', async () => {
            const driver = create_fake_driver({ on_query: () => [author_row] })
            const author = await new QuerySet(
                get_test_context(registry, driver),
                'Author'
            ).first()

            expect(author).to.deep.equal({ id: 1, name: 'X', born_on: null, publisher_id: null })
            expect(driver.query_calls[0][0].sql_string).to.match(
                /ORDER BY `t0`\.`id` ASC LIMIT \?$/
            )
        })
        test('rejects unordered pagination in strict mode', async () => {
            const query_set = new QuerySet(
                get_test_context(registry, create_failing_driver(), {
                    strict_pagination: true,
                }),
                'Author'
            ).limit(5)

            const error = await query_set.all().catch((error: unknown) => error)
            expect(error).to.be.instanceOf(ConfigurationError)
        })
        test('refuses bulk writes without a filter', async () => {
            const authors = get_query_set('Author')

            const update_error = await authors
                .update({ name: 'Y' })
                .catch((error: unknown) => error)
            const delete_error = await authors
                .delete()
                .catch((error: unknown) => error)

            expect(update_error).to.be.instanceOf(ConfigurationError)
            expect(delete_error).to.be.instanceOf(ConfigurationError)
        })
        test('bulk updates the matching keys', async () => {
            const driver = create_fake_driver({
                on_query: () => [{ id: 1 }, { id: 2 }],
                on_run: () => ({ affected_rows: 2 }),
            })

            const updated = await new QuerySet(
                get_test_context(registry, driver),
                'Author'
            )
                .filter({ $contains: ['books.title', 'a'] })
                .update({ name: 'Y' })

            expect(updated).to.equal(2)
            expect(driver.run_calls).to.deep.equal([
                {
                    sql_string: 'UPDATE `authors` SET `name` = ? WHERE `id` IN (?, ?)',
                    params: ['Y', 1, 2],
                },
            ])
        })
    })
})
