import {
    ConfigurationError,
    UnknownRelationError,
} from '../helpers/error_handling'
import { ModelRegistry } from './model_registry'
import { FieldDescriptor, RelationDescriptor } from './schema_types'

export type RelationPath = string | readonly string[]

export const to_path_segments = (path: RelationPath): string[] =>
    typeof path === 'string'
        ? path.split('.').filter(segment => segment.length > 0)
        : [...path]

export const get_outgoing_relations = (
    registry: ModelRegistry,
    model_name: string
) => registry.get_model(model_name).relations

export const get_incoming_relations = (
    registry: ModelRegistry,
    model_name: string
) => registry.get_model(model_name).reverse_relations

/**
 * Finds a relation by accessor name, declared or synthesized
 */
export const get_relation = (
    registry: ModelRegistry,
    model_name: string,
    relation_name: string
): RelationDescriptor | undefined => {
    const model = registry.get_model(model_name)
    return (
        model.relations.find(relation => relation.name === relation_name) ??
        model.reverse_relations.find(
            relation => relation.name === relation_name
        )
    )
}

export const get_field = (
    registry: ModelRegistry,
    model_name: string,
    field_name: string
): FieldDescriptor | undefined =>
    registry
        .get_model(model_name)
        .fields.find(field => field.name === field_name)

/**
 * full_path is the path errors report, which can go on past the relations being walked
 */
const walk_relations = (
    registry: ModelRegistry,
    model_name: string,
    segments: readonly string[],
    full_path: string[]
): RelationDescriptor[] => {
    const relations: RelationDescriptor[] = []
    let current_model = model_name
    for (const segment of segments) {
        const relation = get_relation(registry, current_model, segment)
        if (!relation) {
            throw new UnknownRelationError(current_model, segment, full_path)
        }
        relations.push(relation)
        current_model = relation.target_model
    }

    return relations
}

/**
 * Resolves each segment of a path to a relation, starting at model_name. Only the requested segments are
 * followed, so self-referential relations never recurse on their own.
 */
export const resolve_relation_path = (
    registry: ModelRegistry,
    model_name: string,
    path: RelationPath
): RelationDescriptor[] => {
    const segments = to_path_segments(path)
    if (segments.length === 0) {
        throw new ConfigurationError(
            `Empty relation path on ${model_name}.`,
            { model: model_name }
        )
    }

    return walk_relations(registry, model_name, segments, segments)
}

export type FieldPath = {
    relations: RelationDescriptor[]
    /**
     * Model that owns the field, i.e. the target of the last relation or the root model
     */
    model: string
    field: FieldDescriptor
}

/**
 * Splits a path like `author.publisher.name` into the relations to walk and the field at the end
 */
export const split_field_path = (
    registry: ModelRegistry,
    model_name: string,
    path: RelationPath
): FieldPath => {
    const segments = to_path_segments(path)
    const field_name = segments[segments.length - 1]
    if (field_name === undefined) {
        throw new ConfigurationError(`Empty field path on ${model_name}.`, {
            model: model_name,
        })
    }

    const relation_segments = segments.slice(0, -1)
    const relations = walk_relations(
        registry,
        model_name,
        relation_segments,
        segments
    )
    const model =
        relations.length > 0
            ? relations[relations.length - 1].target_model
            : model_name

    const field = get_field(registry, model, field_name)
    if (!field) {
        const is_relation = get_relation(registry, model, field_name)
        throw new ConfigurationError(
            `Model ${model} has no field named ${field_name} (in path ${segments.join(
                '.'
            )}).`,
            {
                model,
                path: segments,
                recommendation: is_relation
                    ? `${field_name} is a relation. Reference one of its fields, e.g. ${field_name}.${
                          registry.get_model(is_relation.target_model)
                              .primary_key[0]
                      }.`
                    : undefined,
            }
        )
    }

    return { relations, model, field }
}
