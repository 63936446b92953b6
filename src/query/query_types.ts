import { FieldValue } from '../types'

/**
 * Left hand sides are field paths like `title` or `author.publisher.name`
 */
type Comparison = readonly [string, FieldValue]

export type Predicate =
    | { readonly $eq: Comparison }
    | { readonly $ne: Comparison }
    | { readonly $gt: Comparison }
    | { readonly $gte: Comparison }
    | { readonly $lt: Comparison }
    | { readonly $lte: Comparison }
    | { readonly $in: readonly [string, readonly FieldValue[]] }
    /**
     * Substring match. %, _ and the escape character in the value match literally.
     */
    | { readonly $contains: readonly [string, string] }
    | { readonly $is_null: readonly [string, boolean] }
    | { readonly $and: readonly Predicate[] }
    | { readonly $or: readonly Predicate[] }
    | { readonly $not: Predicate }

export type ComparisonOperator = '$eq' | '$ne' | '$gt' | '$gte' | '$lt' | '$lte'

export type OrderDirection = 'asc' | 'desc'

export type Ordering = {
    readonly path: readonly string[]
    readonly direction: OrderDirection
}

/**
 * Everything a QuerySet has accumulated. Never mutated, each builder call makes a new one.
 */
export type QuerySpec = {
    readonly model: string
    readonly where?: Predicate
    readonly order_by: readonly Ordering[]
    readonly limit?: number
    readonly offset?: number
    /**
     * Field paths, e.g. `title` or `author.name`
     */
    readonly only?: readonly string[]
    readonly exclude_fields?: readonly string[]
    /**
     * Relation paths loaded with joins. Every prefix of a path is in the list too.
     */
    readonly select_related: readonly (readonly string[])[]
    /**
     * Relation paths loaded with follow up queries. Every prefix of a path is in the list too.
     */
    readonly prefetch_related: readonly (readonly string[])[]
}

export type QueryOptions = {
    readonly signal?: AbortSignal
}

export type BulkOptions = QueryOptions & {
    /**
     * Allows a bulk update or delete without a filter, touching every row of the table
     */
    readonly each?: boolean
}

export const get_empty_query_spec = (model: string): QuerySpec => ({
    model,
    order_by: [],
    select_related: [],
    prefetch_related: [],
})

/**
 * Field paths of every comparison in a predicate tree
 */
export const get_predicate_paths = (predicate: Predicate): string[] => {
    if ('$and' in predicate) {
        return predicate.$and.flatMap(get_predicate_paths)
    }
    if ('$or' in predicate) {
        return predicate.$or.flatMap(get_predicate_paths)
    }
    if ('$not' in predicate) {
        return get_predicate_paths(predicate.$not)
    }
    if ('$eq' in predicate) return [predicate.$eq[0]]
    if ('$ne' in predicate) return [predicate.$ne[0]]
    if ('$gt' in predicate) return [predicate.$gt[0]]
    if ('$gte' in predicate) return [predicate.$gte[0]]
    if ('$lt' in predicate) return [predicate.$lt[0]]
    if ('$lte' in predicate) return [predicate.$lte[0]]
    if ('$in' in predicate) return [predicate.$in[0]]
    if ('$contains' in predicate) return [predicate.$contains[0]]
    return [predicate.$is_null[0]]
}

export const combine_predicates = (
    predicates: readonly (Predicate | undefined)[]
): Predicate | undefined => {
    const defined = predicates.filter(
        (el): el is Predicate => el !== undefined
    )
    if (defined.length <= 1) {
        return defined[0]
    }

    // flatten so that chained filter calls make one flat $and
    return {
        $and: defined.flatMap(el => ('$and' in el ? el.$and : [el])),
    }
}
