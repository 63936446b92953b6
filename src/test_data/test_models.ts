import { fields, OnDelete, relations } from '../schema/field_types'
import { ModelRegistry } from '../schema/model_registry'

export type TestModelOptions = {
    /**
     * on_delete policy of Book.author
     */
    book_author_on_delete?: OnDelete
}

/**
 * A small library schema used across the test suite:
 *
 * Publisher <- Author <- Book <-> Tag, Author <- Profile (one to one), Category -> Category (self reference)
 */
export const register_test_models = (
    registry: ModelRegistry,
    { book_author_on_delete = 'restrict' }: TestModelOptions = {}
) => {
    registry.register_model({
        name: 'Timestamped',
        abstract: true,
        fields: {
            created_at: fields.datetime({ nullable: true }),
        },
    })

    // declared before Author to exercise forward references
    registry.register_model({
        name: 'Book',
        extends: ['Timestamped'],
        fields: {
            id: fields.integer({ primary_key: true }),
            title: fields.string({ max_length: 100 }),
            pages: fields.integer({ nullable: true }),
            status: fields.string({
                choices: ['draft', 'published'],
                default: 'draft',
            }),
            in_print: fields.boolean({ default: true }),
            metadata: fields.json({ nullable: true }),
        },
        relations: {
            author: relations.foreign_key('Author', {
                nullable: false,
                on_delete: book_author_on_delete,
            }),
            tags: relations.many_to_many('Tag'),
        },
    })

    registry.register_model({
        name: 'Publisher',
        fields: {
            id: fields.integer({ primary_key: true }),
            name: fields.string(),
        },
    })

    registry.register_model({
        name: 'Author',
        fields: {
            id: fields.integer({ primary_key: true }),
            name: fields.string({ max_length: 100 }),
            born_on: fields.date({ nullable: true }),
        },
        relations: {
            publisher: relations.foreign_key('Publisher'),
        },
    })

    registry.register_model({
        name: 'Tag',
        fields: {
            id: fields.integer({ primary_key: true }),
            name: fields.string({ unique: true }),
        },
    })

    registry.register_model({
        name: 'Profile',
        fields: {
            id: fields.integer({ primary_key: true }),
            bio: fields.text({ nullable: true }),
        },
        relations: {
            author: relations.one_to_one('Author', { nullable: false }),
        },
    })

    registry.register_model({
        name: 'Category',
        table: 'categories',
        fields: {
            id: fields.integer({ primary_key: true }),
            name: fields.string(),
        },
        relations: {
            parent: relations.foreign_key('Category', {
                related_name: 'children',
            }),
        },
    })

    return registry
}

export const get_test_registry = (options: TestModelOptions = {}) =>
    register_test_models(new ModelRegistry(), options)
