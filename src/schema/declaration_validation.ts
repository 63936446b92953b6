import { validate } from 'jsonschema'
import { logical_types } from './field_types'

const name_schema = {
    type: 'string',
    pattern: '^[A-Za-z_][A-Za-z0-9_]*$',
}

const field_declaration_schema = {
    type: 'object',
    properties: {
        type: { type: 'string', enum: [...logical_types] },
        nullable: { type: 'boolean' },
        unique: { type: 'boolean' },
        primary_key: { type: 'boolean' },
        auto_increment: { type: 'boolean' },
        default: {},
        server_default: {
            oneOf: [
                { type: 'string' },
                { type: 'number' },
                { type: 'boolean' },
            ],
        },
        column: name_schema,
        choices: {
            type: 'array',
            items: {
                oneOf: [
                    { type: 'string' },
                    { type: 'number' },
                    { type: 'boolean' },
                ],
            },
        },
        max_length: { type: 'integer', minimum: 1 },
        precision: { type: 'integer', minimum: 1 },
        scale: { type: 'integer', minimum: 0 },
    },
    required: ['type'],
    additionalProperties: false,
}

const related_name_schema = {
    oneOf: [name_schema, { type: 'boolean', enum: [false] }],
}

const relation_declaration_schema = {
    oneOf: [
        {
            type: 'object',
            properties: {
                kind: { type: 'string', enum: ['foreign_key', 'one_to_one'] },
                to: name_schema,
                related_name: related_name_schema,
                nullable: { type: 'boolean' },
                on_delete: {
                    type: 'string',
                    enum: ['cascade', 'restrict', 'set_null'],
                },
                field: name_schema,
                column: name_schema,
            },
            required: ['kind', 'to'],
            additionalProperties: false,
        },
        {
            type: 'object',
            properties: {
                kind: { type: 'string', enum: ['many_to_many'] },
                to: name_schema,
                related_name: related_name_schema,
                through: name_schema,
                through_fields: {
                    type: 'array',
                    items: name_schema,
                    minItems: 2,
                    maxItems: 2,
                },
            },
            required: ['kind', 'to'],
            additionalProperties: false,
        },
    ],
}

export const model_declaration_schema = {
    type: 'object',
    properties: {
        name: name_schema,
        table: name_schema,
        abstract: { type: 'boolean' },
        extends: { type: 'array', items: name_schema },
        fields: {
            type: 'object',
            additionalProperties: field_declaration_schema,
        },
        relations: {
            type: 'object',
            additionalProperties: relation_declaration_schema,
        },
        unique_together: {
            type: 'array',
            items: { type: 'array', items: name_schema, minItems: 1 },
        },
    },
    required: ['name', 'fields'],
    additionalProperties: false,
}

/**
 * Checks the shape of a model declaration. Cross model rules (collisions, missing primary keys, unresolved
 * targets) are checked by the registry.
 * @returns a list of error messages, empty if the declaration is valid
 */
export const get_declaration_shape_errors = (declaration: unknown) => {
    const { errors } = validate(declaration, model_declaration_schema)
    return errors.map(error => error.stack)
}

/**
 * Model, field and relation names become parts of column aliases like `author__name`, so a double underscore
 * in a name would make those aliases ambiguous
 */
export const get_reserved_name_errors = (
    model_name: string,
    names: readonly string[]
) =>
    [model_name, ...names]
        .filter(name => name.includes('__'))
        .map(
            name =>
                `${model_name}: the name ${name} contains a double underscore, which is reserved.`
        )
