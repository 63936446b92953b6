import { expect } from 'chai'
import { describe, test } from 'mocha'
import {
    ConfigurationError,
    PersistenceError,
} from '../helpers/error_handling'
import { create_fake_driver, get_test_context } from '../test_data/fake_driver'
import { get_test_registry } from '../test_data/test_models'
import { create_with_related, flatten_record_tree } from './create_with_related'

describe('create_with_related.ts', () => {
    const registry = get_test_registry()

    const get_counting_driver = (fail_at?: number) => {
        let next_id = 100
        return create_fake_driver({
            on_run: () => {
                if (next_id === fail_at) {
                    throw new Error('boom')
                }
                return { affected_rows: 1, insert_id: next_id++ }
            },
        })
    }

    describe(flatten_record_tree.name, () => {
        test('makes one piece per record and per associative row', () => {
            const { pieces, dependents } = flatten_record_tree(
                registry,
                'Author',
                {
                    name: 'X',
                    books: [{ title: 'A', tags: [{ id: 7 }] }],
                }
            )

            expect(
                pieces.map(({ model, path, existing }) => ({
                    model: model.name,
                    path,
                    existing,
                }))
            ).to.deep.equal([
                { model: 'Author', path: [], existing: false },
                { model: 'Book', path: ['books', 0], existing: false },
                { model: 'Tag', path: ['books', 0, 'tags', 0], existing: true },
                {
                    model: 'BookTags',
                    path: ['books', 0, 'tags', 0, 'BookTags'],
                    existing: false,
                },
            ])
            expect(dependents).to.deep.equal({
                0: ['1'],
                1: ['3'],
                2: ['3'],
                3: [],
            })
        })
        test('rejects relations that do not hold records', () => {
            expect(() =>
                flatten_record_tree(registry, 'Book', { title: 'A', tags: ['x'] })
            ).to.throw(ConfigurationError, 'Book.tags must hold related records.')
        })
    })

    describe(create_with_related.name, () => {
        test('inserts parents first and links many-to-many targets', async () => {
            const driver = get_counting_driver()
            const tree = {
                title: 'A',
                author: { name: 'X' },
                tags: [{ id: 7 }, { name: 'new' }],
            }

            await create_with_related(
                get_test_context(registry, driver),
                'Book',
                tree
            )

            expect(driver.run_calls.map(call => call.params)).to.deep.equal([
                ['X'],
                ['new'],
                ['A', 'draft', 1, 100],
                [102, 7],
                [102, 101],
            ])
            expect(tree).to.deep.include({ id: 102, author_id: 100 })
            expect(tree.author).to.deep.equal({ name: 'X', id: 100 })
        })
        test('defers after hooks until everything is written', async () => {
            const driver = get_counting_driver()
            const context = get_test_context(registry, driver)
            const writes_seen: number[] = []
            context.hooks.on('Author', 'after_save', () => {
                writes_seen.push(driver.run_calls.length)
            })

            await create_with_related(context, 'Author', {
                name: 'X',
                books: [{ title: 'A' }, { title: 'B' }],
            })

            expect(writes_seen).to.deep.equal([3])
        })
        test('fails as a whole and skips after hooks', async () => {
            const driver = get_counting_driver(101)
            const context = get_test_context(registry, driver)
            let after_hooks = 0
            context.hooks.on('Author', 'after_save', () => {
                after_hooks++
            })

            const error = await create_with_related(context, 'Author', {
                name: 'X',
                books: [{ title: 'A' }, { title: 'B' }],
            }).catch((error: unknown) => error)

            expect(error).to.be.instanceOf(PersistenceError)
            expect(error).to.have.property('message', 'Could not insert Book: boom')
            expect(after_hooks).to.equal(0)
        })
    })
})
