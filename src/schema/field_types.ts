/**
 * Declaration side of the field / relation mapping layer. These are the plain configuration objects passed to
 * {@link ModelRegistry.register_model}; the registry turns them into descriptors.
 * @module
 */

import { FieldValue } from '../types'

export const logical_types = [
    'string',
    'text',
    'integer',
    'float',
    'decimal',
    'boolean',
    'date',
    'datetime',
    'json',
] as const

export type LogicalType = (typeof logical_types)[number]

export type Choice = string | number | boolean

export type DefaultProvider = () => FieldValue

export type ServerDefault = string | number | boolean

export type FieldOptions = {
    nullable?: boolean
    unique?: boolean
    primary_key?: boolean
    /**
     * Defaults to true for integer primary keys
     */
    auto_increment?: boolean
    /**
     * Applied by the save step when an inserted record leaves the field out
     */
    default?: FieldValue | DefaultProvider
    /**
     * Emitted into the generated DDL, so the database fills the value
     */
    server_default?: ServerDefault
    /**
     * Column name in the table, when it differs from the field name
     */
    column?: string
    choices?: readonly Choice[]
}

export type FieldDeclaration = FieldOptions & {
    type: LogicalType
    max_length?: number
    precision?: number
    scale?: number
}

export const fields = {
    string: (
        options: FieldOptions & { max_length?: number } = {}
    ): FieldDeclaration => ({ type: 'string', max_length: 255, ...options }),
    text: (options: FieldOptions = {}): FieldDeclaration => ({
        type: 'text',
        ...options,
    }),
    integer: (options: FieldOptions = {}): FieldDeclaration => ({
        type: 'integer',
        ...options,
    }),
    float: (options: FieldOptions = {}): FieldDeclaration => ({
        type: 'float',
        ...options,
    }),
    decimal: (
        options: FieldOptions & { precision?: number; scale?: number } = {}
    ): FieldDeclaration => ({
        type: 'decimal',
        precision: 10,
        scale: 2,
        ...options,
    }),
    boolean: (options: FieldOptions = {}): FieldDeclaration => ({
        type: 'boolean',
        ...options,
    }),
    date: (options: FieldOptions = {}): FieldDeclaration => ({
        type: 'date',
        ...options,
    }),
    datetime: (options: FieldOptions = {}): FieldDeclaration => ({
        type: 'datetime',
        ...options,
    }),
    json: (options: FieldOptions = {}): FieldDeclaration => ({
        type: 'json',
        ...options,
    }),
}

export type OnDelete = 'cascade' | 'restrict' | 'set_null'

type ToOneOptions = {
    /**
     * Name of the reverse accessor synthesized on the target model. false suppresses it.
     */
    related_name?: string | false
    nullable?: boolean
    on_delete?: OnDelete
    /**
     * Name of the foreign key field on this model, defaults to `<relation>_id`
     */
    field?: string
    /**
     * Column name of the foreign key field, defaults to the field name
     */
    column?: string
}

export type ForeignKeyDeclaration = ToOneOptions & {
    kind: 'foreign_key'
    to: string
}

export type OneToOneDeclaration = ToOneOptions & {
    kind: 'one_to_one'
    to: string
}

export type ManyToManyDeclaration = {
    kind: 'many_to_many'
    to: string
    related_name?: string | false
    /**
     * Name of an associative model to use instead of a synthesized one
     */
    through?: string
    /**
     * Names of the two many-to-one relations on the through model pointing at this model and at the target.
     * Only needed when they cannot be told apart, e.g. a self-referential many-to-many.
     */
    through_fields?: readonly [string, string]
}

export type RelationDeclaration =
    | ForeignKeyDeclaration
    | OneToOneDeclaration
    | ManyToManyDeclaration

export const relations = {
    foreign_key: (
        to: string,
        options: ToOneOptions = {}
    ): ForeignKeyDeclaration => ({ kind: 'foreign_key', to, ...options }),
    one_to_one: (
        to: string,
        options: ToOneOptions = {}
    ): OneToOneDeclaration => ({ kind: 'one_to_one', to, ...options }),
    many_to_many: (
        to: string,
        options: Omit<ManyToManyDeclaration, 'kind' | 'to'> = {}
    ): ManyToManyDeclaration => ({ kind: 'many_to_many', to, ...options }),
}

export type ModelDeclaration = {
    name: string
    /**
     * Defaults to the snake cased model name with an s on the end
     */
    table?: string
    /**
     * Abstract models get no table and cannot be queried. Their fields and relations are copied into models that
     * list them in extends.
     */
    abstract?: boolean
    extends?: readonly string[]
    fields: Readonly<Record<string, FieldDeclaration>>
    relations?: Readonly<Record<string, RelationDeclaration>>
    /**
     * Columns that must be unique together
     */
    unique_together?: readonly (readonly string[])[]
}
