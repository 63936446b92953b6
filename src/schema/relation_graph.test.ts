import { expect } from 'chai'
import { describe, test } from 'mocha'
import {
    ConfigurationError,
    UnknownRelationError,
} from '../helpers/error_handling'
import { get_test_registry } from '../test_data/test_models'
import {
    get_incoming_relations,
    get_outgoing_relations,
    get_relation,
    resolve_relation_path,
    split_field_path,
} from './relation_graph'

describe('relation_graph.ts', () => {
    const registry = get_test_registry()

    describe(get_outgoing_relations.name, () => {
        test('lists declared and synthesized relations separately', () => {
            expect(
                get_outgoing_relations(registry, 'Book').map(el => el.name)
            ).to.deep.equal(['author', 'tags'])
            expect(
                get_incoming_relations(registry, 'Author').map(el => el.name)
            ).to.deep.equal(['books', 'profile'])
        })
    })
    describe(get_relation.name, () => {
        test('finds reverse accessors', () => {
            expect(get_relation(registry, 'Category', 'children')).to.deep.include(
                {
                    source_model: 'Category',
                    target_model: 'Category',
                    cardinality: 'ONE_TO_MANY',
                    to_field: 'parent_id',
                }
            )
            expect(get_relation(registry, 'Category', 'nope')).to.equal(
                undefined
            )
        })
    })
    describe(resolve_relation_path.name, () => {
        test('resolves dotted paths and segment lists the same way', () => {
            const from_string = resolve_relation_path(
                registry,
                'Book',
                'author.publisher'
            )
            const from_segments = resolve_relation_path(registry, 'Book', [
                'author',
                'publisher',
            ])

            expect(from_string.map(el => el.target_model)).to.deep.equal([
                'Author',
                'Publisher',
            ])
            expect(from_segments).to.deep.equal(from_string)
        })
        test('follows self references only as far as requested', () => {
            const path = resolve_relation_path(
                registry,
                'Category',
                'parent.parent.children'
            )
            expect(path.map(el => el.name)).to.deep.equal([
                'parent',
                'parent',
                'children',
            ])
        })
        test('names the failing segment', () => {
            try {
                resolve_relation_path(registry, 'Book', 'author.agent')
                expect.fail('expected an error')
            } catch (error) {
                expect(error).to.be.instanceOf(UnknownRelationError)
                if (error instanceof UnknownRelationError) {
                    expect(error.model).to.equal('Author')
                    expect(error.segment).to.equal('agent')
                    expect(error.message).to.equal(
                        'Model Author has no relation named agent (in path author.agent).'
                    )
                }
            }
        })
    })
    describe(split_field_path.name, () => {
        test('splits relations from the field', () => {
            const { relations, model, field } = split_field_path(
                registry,
                'Book',
                'author.publisher.name'
            )
            expect(relations.map(el => el.name)).to.deep.equal([
                'author',
                'publisher',
            ])
            expect(model).to.equal('Publisher')
            expect(field.name).to.equal('name')
        })
        test('handles fields on the root model', () => {
            const { relations, field } = split_field_path(
                registry,
                'Book',
                'title'
            )
            expect(relations).to.deep.equal([])
            expect(field.type).to.equal('string')
        })
        test('rejects unknown fields', () => {
            expect(() =>
                split_field_path(registry, 'Book', 'author.nickname')
            ).to.throw(
                ConfigurationError,
                'Model Author has no field named nickname (in path author.nickname).'
            )
        })
        test('reports unknown relations with the whole field path', () => {
            try {
                split_field_path(registry, 'Book', 'author.agent.name')
                expect.fail('expected an error')
            } catch (error) {
                expect(error).to.be.instanceOf(UnknownRelationError)
                if (error instanceof UnknownRelationError) {
                    expect(error.path).to.deep.equal(['author', 'agent', 'name'])
                    expect(error.message).to.equal(
                        'Model Author has no relation named agent (in path author.agent.name).'
                    )
                }
            }
        })
    })
})
