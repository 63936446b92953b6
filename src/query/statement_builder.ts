/**
 * Turns a QuerySpec and its load plan into abstract select statements for the compiler. Nothing here talks to
 * the database.
 *
 * Predicates through to-one relations join the related table once per path (the same aliases select_related
 * uses), so they never multiply rows. A predicate that crosses a to-many relation is rewritten into a chain
 * of IN subqueries instead, which matches a root row when some related row satisfies the comparison.
 * @module
 */

import { Expression } from '../compiler/expression/compile_expression'
import { Join, OrderBy, Select, SelectItem } from '../compiler/query/compile_select'
import { Where } from '../compiler/query/compile_where'
import { ConfigurationError } from '../helpers/error_handling'
import { ModelRegistry } from '../schema/model_registry'
import { split_field_path } from '../schema/relation_graph'
import {
    FieldDescriptor,
    get_model_field,
    get_primary_key_fields,
    is_to_many,
    ModelDescriptor,
    RelationDescriptor,
} from '../schema/schema_types'
import { serialize_filter_value } from '../validation/record_validation'
import { Dialect, FieldValue } from '../types'
import { get_join_alias, LoadNode, LoadPlan } from './load_plan'
import { ComparisonOperator, Predicate, QuerySpec } from './query_types'

/**
 * Column alias holding the link value a prefetched row belongs to
 */
export const parent_key_alias = '__parent_key'

export const like_escape_character = '!'

const root_alias = get_join_alias([])

/**
 * Left joins of one statement, one per to-one relation path, shared between select_related and the paths
 * used by filters and ordering
 */
class JoinSet {
    private readonly joins = new Map<string, Join>()

    constructor(
        private readonly registry: ModelRegistry,
        private readonly root_model: ModelDescriptor
    ) {}

    /**
     * Joins every prefix of the path and returns the alias of the last model on it
     */
    add(relations: readonly RelationDescriptor[]) {
        let parent_alias = root_alias
        let parent_model = this.root_model
        relations.forEach((relation, i) => {
            const path = relations.slice(0, i + 1).map(el => el.name)
            const alias = get_join_alias(path)
            const target_model = this.registry.get_model(relation.target_model)
            if (!this.joins.has(alias)) {
                this.joins.set(alias, {
                    type: 'left',
                    table: target_model.table,
                    as: alias,
                    on: {
                        eq: [
                            {
                                table: alias,
                                column: get_model_field(
                                    target_model,
                                    relation.to_field
                                ).column,
                            },
                            {
                                table: parent_alias,
                                column: get_model_field(
                                    parent_model,
                                    relation.from_field
                                ).column,
                            },
                        ],
                    },
                })
            }
            parent_alias = alias
            parent_model = target_model
        })

        return parent_alias
    }

    get_joins() {
        return [...this.joins.values()]
    }
}

type WhereContext = {
    readonly registry: ModelRegistry
    readonly dialect: Dialect
    readonly joins: JoinSet
    /**
     * Hands out subquery aliases, unique within one statement
     */
    readonly next_alias: () => string
}

const comparison_keys = {
    $eq: 'eq',
    $ne: 'ne',
    $gt: 'gt',
    $gte: 'gte',
    $lt: 'lt',
    $lte: 'lte',
} as const

const escape_like = (value: string) =>
    value.replace(/[!%_]/g, character => `${like_escape_character}${character}`)

/**
 * Builds the condition on a single column, with the path already resolved
 */
const build_leaf_where = (
    predicate: Predicate,
    column: Expression,
    field: FieldDescriptor,
    dialect: Dialect
): Where => {
    const to_param = (value: FieldValue) => ({
        param: serialize_filter_value(field, value, dialect),
    })

    if ('$in' in predicate) {
        return { in: [column, predicate.$in[1].map(to_param)] }
    }

    if ('$contains' in predicate) {
        return {
            like: [
                column,
                { param: `%${escape_like(predicate.$contains[1])}%` },
            ],
            escape: like_escape_character,
        }
    }

    if ('$is_null' in predicate) {
        return predicate.$is_null[1]
            ? { is_null: column }
            : { is_not_null: column }
    }

    const comparison = get_comparison(predicate)
    if (comparison === undefined) {
        // combinators never reach a leaf
        return { never: true }
    }

    const [operator, [, value]] = comparison
    if (value === null && operator === '$eq') {
        return { is_null: column }
    }
    if (value === null && operator === '$ne') {
        return { is_not_null: column }
    }

    const operands = [column, to_param(value)] as const
    switch (comparison_keys[operator]) {
        case 'eq':
            return { eq: operands }
        case 'ne':
            return { ne: operands }
        case 'gt':
            return { gt: operands }
        case 'gte':
            return { gte: operands }
        case 'lt':
            return { lt: operands }
        case 'lte':
            return { lte: operands }
    }
}

const get_comparison = (
    predicate: Predicate
): [ComparisonOperator, readonly [string, FieldValue]] | undefined => {
    if ('$eq' in predicate) return ['$eq', predicate.$eq]
    if ('$ne' in predicate) return ['$ne', predicate.$ne]
    if ('$gt' in predicate) return ['$gt', predicate.$gt]
    if ('$gte' in predicate) return ['$gte', predicate.$gte]
    if ('$lt' in predicate) return ['$lt', predicate.$lt]
    if ('$lte' in predicate) return ['$lte', predicate.$lte]
    return undefined
}

const get_leaf_path = (predicate: Predicate): string => {
    if ('$in' in predicate) return predicate.$in[0]
    if ('$contains' in predicate) return predicate.$contains[0]
    if ('$is_null' in predicate) return predicate.$is_null[0]
    return get_comparison(predicate)?.[1][0] ?? ''
}

/**
 * A chain of IN subqueries walking relations from a model at some alias down to the compared field. Every
 * relation of the chain is one subquery, so a to-many step never multiplies the outer rows. Subqueries never
 * select NULL, since a NULL in the list turns NOT IN into unknown for every outer row.
 */
const build_subquery_chain = (
    relations: readonly RelationDescriptor[],
    predicate: Predicate,
    field: FieldDescriptor,
    context: WhereContext,
    outer_alias: string,
    outer_model: ModelDescriptor
): Where => {
    const [relation, ...rest] = relations
    if (relation === undefined) {
        return build_leaf_where(
            predicate,
            { table: outer_alias, column: field.column },
            field,
            context.dialect
        )
    }

    const { registry } = context
    const target_model = registry.get_model(relation.target_model)
    const target_alias = context.next_alias()
    const inner_where = build_subquery_chain(
        rest,
        predicate,
        field,
        context,
        target_alias,
        target_model
    )
    const outer_column: Expression = {
        table: outer_alias,
        column: get_model_field(outer_model, relation.from_field).column,
    }
    const target_column: Expression = {
        table: target_alias,
        column: get_model_field(target_model, relation.to_field).column,
    }

    if (relation.through === undefined) {
        return {
            in: [
                outer_column,
                {
                    select: [{ expression: target_column }],
                    from: { table: target_model.table, as: target_alias },
                    where: {
                        and: [inner_where, { is_not_null: target_column }],
                    },
                },
            ],
        }
    }

    const through_model = registry.get_model(relation.through.model)
    const through_alias = context.next_alias()
    const through_column: Expression = {
        table: through_alias,
        column: get_model_field(through_model, relation.through.source_field)
            .column,
    }
    return {
        in: [
            outer_column,
            {
                select: [{ expression: through_column }],
                from: { table: through_model.table, as: through_alias },
                joins: [
                    {
                        type: 'inner',
                        table: target_model.table,
                        as: target_alias,
                        on: {
                            eq: [
                                target_column,
                                {
                                    table: through_alias,
                                    column: get_model_field(
                                        through_model,
                                        relation.through.target_field
                                    ).column,
                                },
                            ],
                        },
                    },
                ],
                where: {
                    and: [inner_where, { is_not_null: through_column }],
                },
            },
        ],
    }
}

/**
 * Translates a predicate tree on the root model, adding the joins its to-one paths need
 */
const build_where = (
    predicate: Predicate,
    root_model: ModelDescriptor,
    context: WhereContext
): Where => {
    if ('$and' in predicate) {
        return {
            and: predicate.$and.map(el => build_where(el, root_model, context)),
        }
    }
    if ('$or' in predicate) {
        return {
            or: predicate.$or.map(el => build_where(el, root_model, context)),
        }
    }
    if ('$not' in predicate) {
        return { not: build_where(predicate.$not, root_model, context) }
    }

    const { relations, field } = split_field_path(
        context.registry,
        root_model.name,
        get_leaf_path(predicate)
    )

    // the to-one prefix of the path is joined, the rest becomes subqueries
    const to_many_index = relations.findIndex(is_to_many)
    const joined_relations =
        to_many_index === -1 ? relations : relations.slice(0, to_many_index)
    const subquery_relations =
        to_many_index === -1 ? [] : relations.slice(to_many_index)

    const alias = context.joins.add(joined_relations)
    const alias_model =
        joined_relations.length > 0
            ? context.registry.get_model(
                  joined_relations[joined_relations.length - 1].target_model
              )
            : root_model

    return build_subquery_chain(
        subquery_relations,
        predicate,
        field,
        context,
        alias,
        alias_model
    )
}

const create_where_context = (
    registry: ModelRegistry,
    dialect: Dialect,
    joins: JoinSet
): WhereContext => {
    let subquery_count = 0
    return {
        registry,
        dialect,
        joins,
        next_alias: () => {
            subquery_count += 1
            return `s${subquery_count}`
        },
    }
}

const build_order_by = (
    spec: QuerySpec,
    root_model: ModelDescriptor,
    context: WhereContext
): OrderBy[] =>
    spec.order_by.map(({ path, direction }) => {
        const { relations, field } = split_field_path(
            context.registry,
            root_model.name,
            path
        )
        const to_many = relations.find(is_to_many)
        if (to_many) {
            throw new ConfigurationError(
                `Cannot order ${root_model.name} by ${path.join('.')}: ${
                    to_many.name
                } is a to-many relation.`,
                { model: root_model.name, path: [...path] }
            )
        }

        return {
            expression: {
                table: context.joins.add(relations),
                column: field.column,
            },
            direction,
        }
    })

const get_select_items = (
    node: LoadNode,
    alias: string
): SelectItem[] =>
    node.selected_fields.map(field => ({
        expression: { table: alias, column: field.column },
        as: `${node.column_prefix}${field.name}`,
    }))

/**
 * Root statement of a query: the root model's columns and the columns of every select_related model, joined
 * in, with the filter, ordering and pagination of the QuerySpec
 */
export const build_root_select = (
    registry: ModelRegistry,
    spec: QuerySpec,
    plan: LoadPlan,
    dialect: Dialect
): Select => {
    const root_model = plan.root.model
    const joins = new JoinSet(registry, root_model)
    const context = create_where_context(registry, dialect, joins)

    const select_items: SelectItem[] = []
    const add_node = (node: LoadNode) => {
        const relations = get_node_relations(node)
        select_items.push(...get_select_items(node, joins.add(relations)))
        node.children
            .filter(child => child.kind === 'join')
            .forEach(add_node)
    }
    add_node(plan.root)

    const where = spec.where
        ? build_where(spec.where, root_model, context)
        : undefined
    const order_by = build_order_by(spec, root_model, context)

    return {
        select: select_items,
        from: { table: root_model.table, as: root_alias },
        joins: joins.get_joins(),
        where,
        order_by,
        limit: spec.limit,
        offset: spec.offset,
    }
}

const get_node_relations = (node: LoadNode): RelationDescriptor[] =>
    node.parent && node.relation && node.kind === 'join'
        ? [...get_node_relations(node.parent), node.relation]
        : []

/**
 * Counts the rows matching the filter. Pagination is left to the caller.
 */
export const build_count_select = (
    registry: ModelRegistry,
    spec: QuerySpec,
    dialect: Dialect
): Select => {
    const root_model = registry.get_model(spec.model)
    const joins = new JoinSet(registry, root_model)
    const context = create_where_context(registry, dialect, joins)
    const where = spec.where
        ? build_where(spec.where, root_model, context)
        : undefined

    return {
        select: [{ expression: { count: '*' }, as: 'count' }],
        from: { table: root_model.table, as: root_alias },
        joins: joins.get_joins(),
        where,
    }
}

/**
 * Selects the primary keys of matching rows, which bulk updates and deletes and exists() work from
 */
export const build_key_select = (
    registry: ModelRegistry,
    spec: QuerySpec,
    dialect: Dialect
): Select => {
    const root_model = registry.get_model(spec.model)
    const joins = new JoinSet(registry, root_model)
    const context = create_where_context(registry, dialect, joins)
    const where = spec.where
        ? build_where(spec.where, root_model, context)
        : undefined
    const order_by = build_order_by(spec, root_model, context)

    return {
        select: get_primary_key_fields(root_model).map(field => ({
            expression: { table: root_alias, column: field.column },
            as: field.name,
        })),
        from: { table: root_model.table, as: root_alias },
        joins: joins.get_joins(),
        where,
        order_by,
        limit: spec.limit,
        offset: spec.offset,
    }
}

/**
 * Follow up statement for a prefetch node, fetching the related rows of every parent key at once. Each row
 * carries the key of the parent it belongs to under {@link parent_key_alias}.
 */
export const build_prefetch_select = (
    registry: ModelRegistry,
    node: LoadNode,
    parent_keys: readonly unknown[]
): Select => {
    const { relation, model } = node
    if (!relation) {
        throw new ConfigurationError(
            `Cannot prefetch ${model.name} without a relation.`,
            { model: model.name }
        )
    }

    const select_items = get_select_items(node, root_alias)
    const to_column: Expression = {
        table: root_alias,
        column: get_model_field(model, relation.to_field).column,
    }
    const order_by: OrderBy[] = get_primary_key_fields(model).map(field => ({
        expression: { table: root_alias, column: field.column },
        direction: 'asc',
    }))
    const keys = parent_keys.map(key => ({ param: key }))

    if (relation.through === undefined) {
        return {
            select: [...select_items, { expression: to_column, as: parent_key_alias }],
            from: { table: model.table, as: root_alias },
            where: { in: [to_column, keys] },
            order_by,
        }
    }

    const through_alias = 't_through'
    const through_model = registry.get_model(relation.through.model)
    const source_column: Expression = {
        table: through_alias,
        column: get_model_field(through_model, relation.through.source_field)
            .column,
    }

    return {
        select: [
            ...select_items,
            { expression: source_column, as: parent_key_alias },
        ],
        from: { table: model.table, as: root_alias },
        joins: [
            {
                type: 'inner',
                table: through_model.table,
                as: through_alias,
                on: {
                    eq: [
                        {
                            table: through_alias,
                            column: get_model_field(
                                through_model,
                                relation.through.target_field
                            ).column,
                        },
                        to_column,
                    ],
                },
            },
        ],
        where: { in: [source_column, keys] },
        order_by,
    }
}
