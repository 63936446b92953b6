import { ConfigurationError } from '../helpers/error_handling'
import {
    Choice,
    DefaultProvider,
    LogicalType,
    OnDelete,
    ServerDefault,
} from './field_types'

export type Cardinality =
    | 'ONE_TO_ONE'
    | 'MANY_TO_ONE'
    | 'ONE_TO_MANY'
    | 'MANY_TO_MANY'

export type ForeignKeyTarget = {
    readonly model: string
    readonly field: string
    readonly on_delete?: OnDelete
}

export type FieldDescriptor = {
    readonly name: string
    readonly column: string
    readonly type: LogicalType
    readonly nullable: boolean
    readonly primary_key: boolean
    readonly auto_increment: boolean
    readonly unique: boolean
    readonly default?: DefaultProvider
    readonly server_default?: ServerDefault
    readonly max_length?: number
    readonly precision?: number
    readonly scale?: number
    readonly choices?: readonly Choice[]
    /**
     * Set when this field is the column of a many-to-one or one-to-one relation
     */
    readonly foreign_key?: ForeignKeyTarget
}

export type ThroughDescriptor = {
    readonly model: string
    /**
     * Field on the through model holding the source model's primary key
     */
    readonly source_field: string
    /**
     * Field on the through model holding the target model's primary key
     */
    readonly target_field: string
}

/**
 * A traversable edge from source_model to target_model. Rows are linked where
 * `target.to_field = source.from_field`, or through the associative model for many-to-many relations, where
 * `through.source_field = source.from_field` and `through.target_field = target.to_field`.
 *
 * Models are referenced by name, so self-referential and mutually referential models never own each other.
 */
export type RelationDescriptor = {
    readonly name: string
    readonly source_model: string
    readonly target_model: string
    readonly cardinality: Cardinality
    readonly from_field: string
    readonly to_field: string
    readonly through?: ThroughDescriptor
    /**
     * Name of the reciprocal accessor on the target model, if there is one
     */
    readonly reverse_name?: string
    /**
     * True for accessors synthesized from a relation declared on another model
     */
    readonly is_reverse: boolean
    readonly nullable: boolean
}

export type ModelDescriptor = {
    readonly name: string
    readonly table: string
    readonly fields: readonly FieldDescriptor[]
    readonly primary_key: readonly string[]
    /**
     * Relations declared on this model
     */
    readonly relations: readonly RelationDescriptor[]
    /**
     * Accessors synthesized on this model for relations declared elsewhere
     */
    readonly reverse_relations: readonly RelationDescriptor[]
    readonly unique_together: readonly (readonly string[])[]
    /**
     * True for associative models synthesized for a many-to-many relation
     */
    readonly is_through: boolean
}

export const is_to_many = (relation: RelationDescriptor) =>
    relation.cardinality === 'ONE_TO_MANY' ||
    relation.cardinality === 'MANY_TO_MANY'

export const get_model_field = (
    model: ModelDescriptor,
    field_name: string
): FieldDescriptor => {
    const field = model.fields.find(el => el.name === field_name)
    if (!field) {
        throw new ConfigurationError(
            `Model ${model.name} has no field named ${field_name}.`,
            { model: model.name, path: [field_name] }
        )
    }

    return field
}

export const get_primary_key_fields = (model: ModelDescriptor) =>
    model.primary_key.map(field_name => get_model_field(model, field_name))
