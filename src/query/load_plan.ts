/**
 * The load plan is the tree of everything one query fetches. The root node is the queried model, join nodes
 * are to-one relations loaded by joins in the root statement (select_related), and prefetch nodes are relations
 * loaded by a follow up statement each (prefetch_related).
 *
 * Prefetch nodes are grouped into tiers by how many prefetches sit above them. A tier can only run once the
 * tiers before it have returned the keys it filters by.
 * @module
 */

import { ConfigurationError } from '../helpers/error_handling'
import { ModelRegistry } from '../schema/model_registry'
import {
    resolve_relation_path,
    split_field_path,
} from '../schema/relation_graph'
import {
    FieldDescriptor,
    get_model_field,
    get_primary_key_fields,
    is_to_many,
    ModelDescriptor,
    RelationDescriptor,
} from '../schema/schema_types'
import { QuerySpec } from './query_types'

export type LoadNode = {
    readonly kind: 'root' | 'join' | 'prefetch'
    /**
     * Relation names from the root model to this node
     */
    readonly path: readonly string[]
    readonly model: ModelDescriptor
    /**
     * Relation from the parent node, undefined on the root
     */
    readonly relation?: RelationDescriptor
    readonly parent?: LoadNode
    /**
     * Fields put on the hydrated record
     */
    readonly fields: FieldDescriptor[]
    /**
     * Fields fetched, which adds the link fields prefetch children filter by
     */
    readonly selected_fields: FieldDescriptor[]
    readonly children: LoadNode[]
    /**
     * Prefix of this node's column aliases in the rows it is read from. Join columns live in the root rows under
     * `<path>__<field>`, root and prefetch columns are not prefixed.
     */
    readonly column_prefix: string
    /**
     * 0 for the root and join nodes, otherwise the number of prefetch nodes from the root down to this one
     */
    readonly tier: number
}

export type LoadPlan = {
    readonly root: LoadNode
    /**
     * Prefetch nodes grouped by tier, first tier first
     */
    readonly prefetch_tiers: LoadNode[][]
}

export const path_separator = '__'

export const get_join_alias = (path: readonly string[]) =>
    path.length === 0 ? 't0' : `t_${path.join(path_separator)}`

const get_field_selection = (
    registry: ModelRegistry,
    spec: QuerySpec
): {
    mode: 'only' | 'exclude' | 'all'
    fields_by_path: Map<string, Set<string>>
} => {
    const field_paths = spec.only ?? spec.exclude_fields
    const fields_by_path = new Map<string, Set<string>>()

    ;(field_paths ?? []).forEach(field_path => {
        const { relations, field } = split_field_path(
            registry,
            spec.model,
            field_path
        )
        const key = relations.map(relation => relation.name).join('.')
        const fields = fields_by_path.get(key) ?? new Set<string>()
        fields.add(field.name)
        fields_by_path.set(key, fields)
    })

    return {
        mode: spec.only ? 'only' : spec.exclude_fields ? 'exclude' : 'all',
        fields_by_path,
    }
}

const get_hydrated_fields = (
    model: ModelDescriptor,
    path: readonly string[],
    selection: ReturnType<typeof get_field_selection>
) => {
    const listed = selection.fields_by_path.get(path.join('.'))
    if (selection.mode === 'all' || listed === undefined) {
        return [...model.fields]
    }

    return model.fields.filter(
        field =>
            // primary keys are always fetched, since hydration deduplicates by them
            field.primary_key ||
            (selection.mode === 'only'
                ? listed.has(field.name)
                : !listed.has(field.name))
    )
}

/**
 * Builds the load plan of a query. select_related paths become join nodes, prefetch_related paths become
 * prefetch nodes, except for the segments that are already joined.
 */
export const build_load_plan = (
    registry: ModelRegistry,
    spec: QuerySpec
): LoadPlan => {
    const selection = get_field_selection(registry, spec)

    const create_node = (
        kind: LoadNode['kind'],
        path: readonly string[],
        model: ModelDescriptor,
        relation: RelationDescriptor | undefined,
        parent: LoadNode | undefined
    ): LoadNode => {
        const fields = get_hydrated_fields(model, path, selection)
        return {
            kind,
            path,
            model,
            relation,
            parent,
            fields,
            selected_fields: [...fields],
            children: [],
            column_prefix:
                kind === 'join'
                    ? `${path.join(path_separator)}${path_separator}`
                    : '',
            tier:
                kind === 'prefetch'
                    ? (parent?.tier ?? 0) + 1
                    : parent?.tier ?? 0,
        }
    }

    const root = create_node(
        'root',
        [],
        registry.get_model(spec.model),
        undefined,
        undefined
    )

    const add_path = (path: readonly string[], kind: 'join' | 'prefetch') => {
        const relations = resolve_relation_path(registry, spec.model, path)
        let parent = root
        relations.forEach((relation, i) => {
            const existing = parent.children.find(
                child => child.relation?.name === relation.name
            )
            if (existing) {
                parent = existing
                return
            }

            // joins can only continue a chain of joins
            const child_kind =
                kind === 'join' && parent.kind !== 'prefetch'
                    ? 'join'
                    : 'prefetch'
            if (child_kind === 'join' && is_to_many(relation)) {
                throw new ConfigurationError(
                    `Cannot select_related ${path.join(
                        '.'
                    )}: ${relation.name} is a to-many relation. Use prefetch_related instead.`,
                    { model: spec.model, path: [...path] }
                )
            }

            const child = create_node(
                child_kind,
                path.slice(0, i + 1),
                registry.get_model(relation.target_model),
                relation,
                parent
            )
            parent.children.push(child)

            if (child_kind === 'prefetch') {
                add_selected_field(
                    parent,
                    get_model_field(parent.model, relation.from_field)
                )
            }
            parent = child
        })
    }

    spec.select_related.forEach(path => add_path(path, 'join'))
    spec.prefetch_related.forEach(path => add_path(path, 'prefetch'))

    return { root, prefetch_tiers: get_prefetch_tiers(root) }
}

const add_selected_field = (node: LoadNode, field: FieldDescriptor) => {
    if (!node.selected_fields.some(el => el.name === field.name)) {
        node.selected_fields.push(field)
    }
}

const get_prefetch_tiers = (root: LoadNode) => {
    const tiers: LoadNode[][] = []
    const visit = (node: LoadNode) => {
        if (node.kind === 'prefetch') {
            const tier_index = node.tier - 1
            tiers[tier_index] = [...(tiers[tier_index] ?? []), node]
        }
        node.children.forEach(visit)
    }
    visit(root)

    return tiers
}

export const get_primary_key_aliases = (node: LoadNode) =>
    get_primary_key_fields(node.model).map(
        field => `${node.column_prefix}${field.name}`
    )

/**
 * The node whose rows hold this node's columns: the node itself, or for a join node the root or prefetch node
 * it was joined into
 */
export const get_row_owner = (node: LoadNode): LoadNode =>
    node.kind === 'join' && node.parent ? get_row_owner(node.parent) : node
