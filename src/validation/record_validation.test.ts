import { expect } from 'chai'
import { describe, test } from 'mocha'
import { ValidationError } from '../helpers/error_handling'
import { get_test_registry } from '../test_data/test_models'
import {
    apply_defaults,
    coerce_field_value,
    serialize_record,
    validate_record,
} from './record_validation'

describe('record_validation.ts', () => {
    const registry = get_test_registry()
    const book = registry.get_model('Book')
    const author = registry.get_model('Author')

    describe(validate_record.name, () => {
        test('coerces driver values in hydrate mode', () => {
            const record = validate_record(
                book,
                {
                    id: '3',
                    title: 'Dune',
                    in_print: 0,
                    created_at: '2020-01-02T03:04:05.000Z',
                    metadata: '{"isbn":"123"}',
                    author_id: 1n,
                },
                'hydrate'
            )

            expect(record).to.deep.equal({
                id: 3,
                title: 'Dune',
                in_print: false,
                created_at: new Date('2020-01-02T03:04:05.000Z'),
                metadata: { isbn: '123' },
                author_id: 1,
            })
        })
        test('only checks present fields outside of insert mode', () => {
            expect(validate_record(author, { name: 'X' }, 'update')).to.deep.equal(
                { name: 'X' }
            )
        })
        test('requires fields the database cannot fill on insert', () => {
            try {
                validate_record(book, { title: 'Dune' }, 'insert')
                expect.fail('expected an error')
            } catch (error) {
                expect(error).to.be.instanceOf(ValidationError)
                if (error instanceof ValidationError) {
                    expect(error.errors.map(el => el.field)).to.deep.equal([
                        'author_id',
                    ])
                }
            }
        })
        test('rejects values outside the declared choices and lengths', () => {
            try {
                validate_record(
                    book,
                    { status: 'lost', title: 'x'.repeat(101) },
                    'update'
                )
                expect.fail('expected an error')
            } catch (error) {
                expect(error).to.be.instanceOf(ValidationError)
                if (error instanceof ValidationError) {
                    expect(error.errors.map(el => el.field).sort()).to.deep.equal([
                        'status',
                        'title',
                    ])
                }
            }
        })
        test('rejects null in non nullable fields', () => {
            expect(() =>
                validate_record(author, { name: null }, 'update')
            ).to.throw(ValidationError, 'Invalid Author: name')
        })
        test('accepts null in nullable fields', () => {
            expect(
                validate_record(author, { born_on: null }, 'update')
            ).to.deep.equal({ born_on: null })
        })
    })
    describe(coerce_field_value.name, () => {
        test('turns dates into date strings', () => {
            const born_on = author.fields.find(el => el.name === 'born_on')
            expect(
                born_on &&
                    coerce_field_value(born_on, new Date('1920-01-02T00:00:00Z'))
            ).to.equal('1920-01-02')
        })
    })
    describe(serialize_record.name, () => {
        test('serializes per dialect and keys by column', () => {
            const values = {
                title: 'Dune',
                in_print: true,
                created_at: new Date('2020-01-02T03:04:05.000Z'),
                metadata: { isbn: '123' },
            }

            expect(serialize_record(book, values, 'sqlite')).to.deep.equal({
                created_at: '2020-01-02T03:04:05.000Z',
                title: 'Dune',
                in_print: 1,
                metadata: '{"isbn":"123"}',
            })
            expect(serialize_record(book, values, 'postgres')).to.deep.equal({
                created_at: new Date('2020-01-02T03:04:05.000Z'),
                title: 'Dune',
                in_print: true,
                metadata: '{"isbn":"123"}',
            })
        })
    })
    describe(apply_defaults.name, () => {
        test('fills missing fields from their defaults', () => {
            expect(apply_defaults(book, { title: 'Dune' })).to.deep.equal({
                title: 'Dune',
                status: 'draft',
                in_print: true,
            })
            expect(
                apply_defaults(book, { title: 'Dune', status: 'published' })
                    .status
            ).to.equal('published')
        })
    })
})
