import {
    ConfigurationError,
    MultipleMatchesError,
    NoMatchError,
} from '../helpers/error_handling'
import { bulk_delete, bulk_update } from '../mutate/bulk'
import { SaveContext } from '../mutate/save'
import {
    resolve_relation_path,
    split_field_path,
    to_path_segments,
    RelationPath,
} from '../schema/relation_graph'
import { get_primary_key_fields, is_to_many } from '../schema/schema_types'
import { OrmRecord } from '../types'
import { execute_count, execute_query, get_matching_keys } from './execute_query'
import {
    BulkOptions,
    combine_predicates,
    get_empty_query_spec,
    get_predicate_paths,
    OrderDirection,
    Predicate,
    QueryOptions,
    QuerySpec,
} from './query_types'

const check_non_negative_integer = (
    model: string,
    name: string,
    value: number
) => {
    if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(
            `${name} must be a non negative integer, got ${value}.`,
            { model }
        )
    }
}

/**
 * Every prefix of every path, without duplicates, in the order they were first seen
 */
const add_path_prefixes = (
    existing: readonly (readonly string[])[],
    paths: readonly (readonly string[])[]
) => {
    const result = [...existing]
    const keys = new Set(existing.map(path => path.join('.')))
    paths.forEach(path => {
        path.forEach((_, i) => {
            const prefix = path.slice(0, i + 1)
            const key = prefix.join('.')
            if (!keys.has(key)) {
                keys.add(key)
                result.push(prefix)
            }
        })
    })
    return result
}

/**
 * An immutable description of a query on one model. Builder methods return a new QuerySet and never touch the
 * database, paths are checked against the relation graph as soon as they are given. The terminal methods
 * (all, first, get, count, exists, update, delete) run the query.
 *
 * @example
 * const books = await db
 *     .objects('Book')
 *     .filter({ $eq: ['author.name', 'Ursula'] })
 *     .select_related('author')
 *     .prefetch_related('tags')
 *     .order_by('-pages')
 *     .all()
 */
export class QuerySet {
    readonly spec: QuerySpec

    constructor(
        private readonly context: SaveContext,
        spec: QuerySpec | string
    ) {
        this.spec = Object.freeze(
            typeof spec === 'string' ? get_empty_query_spec(spec) : spec
        )
        // fails early for unknown models
        context.registry.get_model(this.spec.model)
    }

    private with_spec(changes: Partial<QuerySpec>) {
        return new QuerySet(this.context, { ...this.spec, ...changes })
    }

    private check_field_path(path: RelationPath) {
        split_field_path(this.context.registry, this.spec.model, path)
    }

    /**
     * Keeps records matching the predicate. Calling filter again narrows further, both predicates must match.
     */
    filter(predicate: Predicate) {
        get_predicate_paths(predicate).forEach(path =>
            this.check_field_path(path)
        )
        return this.with_spec({
            where: combine_predicates([this.spec.where, predicate]),
        })
    }

    exclude(predicate: Predicate) {
        return this.filter({ $not: predicate })
    }

    /**
     * @param field a field or a path through to-one relations, prefixed with - for descending order
     */
    order_by(field: string, direction?: OrderDirection) {
        const is_descending_shorthand = field.startsWith('-')
        const path = to_path_segments(
            is_descending_shorthand ? field.slice(1) : field
        )
        const { relations } = split_field_path(
            this.context.registry,
            this.spec.model,
            path
        )
        if (relations.some(is_to_many)) {
            throw new ConfigurationError(
                `Cannot order ${this.spec.model} by ${path.join(
                    '.'
                )}, which goes through a to-many relation.`,
                { model: this.spec.model, path }
            )
        }

        return this.with_spec({
            order_by: [
                ...this.spec.order_by,
                {
                    path,
                    direction:
                        direction ?? (is_descending_shorthand ? 'desc' : 'asc'),
                },
            ],
        })
    }

    limit(limit: number) {
        check_non_negative_integer(this.spec.model, 'limit', limit)
        return this.with_spec({ limit })
    }

    offset(offset: number) {
        check_non_negative_integer(this.spec.model, 'offset', offset)
        return this.with_spec({ offset })
    }

    /**
     * @param page starts at 1
     */
    paginate(page: number, page_size: number) {
        if (!Number.isInteger(page) || page < 1) {
            throw new ConfigurationError(
                `page must be a positive integer, got ${page}.`,
                { model: this.spec.model }
            )
        }
        return this.limit(page_size).offset((page - 1) * page_size)
    }

    /**
     * Loads to-one relations with joins in the same statement as the records
     */
    select_related(...paths: RelationPath[]) {
        const segment_lists = paths.map(path => {
            const segments = to_path_segments(path)
            const relations = resolve_relation_path(
                this.context.registry,
                this.spec.model,
                segments
            )
            const to_many = relations.find(is_to_many)
            if (to_many) {
                throw new ConfigurationError(
                    `Cannot select_related ${segments.join('.')}: ${
                        to_many.name
                    } is a to-many relation.`,
                    {
                        model: this.spec.model,
                        path: segments,
                        recommendation: 'Use prefetch_related instead.',
                    }
                )
            }
            return segments
        })

        return this.with_spec({
            select_related: add_path_prefixes(
                this.spec.select_related,
                segment_lists
            ),
        })
    }

    /**
     * Loads relations of any cardinality with one follow up statement per relation
     */
    prefetch_related(...paths: RelationPath[]) {
        const segment_lists = paths.map(path => {
            const segments = to_path_segments(path)
            resolve_relation_path(this.context.registry, this.spec.model, segments)
            return segments
        })

        return this.with_spec({
            prefetch_related: add_path_prefixes(
                this.spec.prefetch_related,
                segment_lists
            ),
        })
    }

    /**
     * Fetches only these fields (and the primary key). Fields of related models are given as paths, e.g.
     * `author.name`.
     */
    only(...field_paths: string[]) {
        if (this.spec.exclude_fields) {
            throw new ConfigurationError(
                'only and exclude_fields cannot be used in the same query.',
                { model: this.spec.model }
            )
        }
        field_paths.forEach(path => this.check_field_path(path))
        return this.with_spec({
            only: [...(this.spec.only ?? []), ...field_paths],
        })
    }

    exclude_fields(...field_paths: string[]) {
        if (this.spec.only) {
            throw new ConfigurationError(
                'only and exclude_fields cannot be used in the same query.',
                { model: this.spec.model }
            )
        }
        field_paths.forEach(path => this.check_field_path(path))
        return this.with_spec({
            exclude_fields: [...(this.spec.exclude_fields ?? []), ...field_paths],
        })
    }

    private check_pagination() {
        const { limit, offset, order_by, model } = this.spec
        if (
            (limit === undefined && offset === undefined) ||
            order_by.length > 0
        ) {
            return
        }

        const message = `${model} is paginated without an order_by, so the rows of each page are not stable.`
        if (this.context.config.strict_pagination) {
            throw new ConfigurationError(message, {
                model,
                recommendation: 'Add an order_by before limit or offset.',
            })
        }
        this.context.logger.warn({ model }, message)
    }

    async all({ signal }: QueryOptions = {}): Promise<OrmRecord[]> {
        this.check_pagination()
        return execute_query(this.context, this.spec, signal)
    }

    /**
     * The first record in the query's order, by primary key when no order is given
     */
    async first({ signal }: QueryOptions = {}): Promise<OrmRecord | undefined> {
        const model = this.context.registry.get_model(this.spec.model)
        const order_by =
            this.spec.order_by.length > 0
                ? this.spec.order_by
                : get_primary_key_fields(model).map(field => ({
                      path: [field.name],
                      direction: 'asc' as const,
                  }))

        const [record] = await execute_query(
            this.context,
            { ...this.spec, order_by, limit: 1 },
            signal
        )
        return record
    }

    /**
     * The one record matching the query (and the predicate, if given)
     * @throws NoMatchError when nothing matches
     * @throws MultipleMatchesError when more than one record matches
     */
    async get(
        predicate?: Predicate,
        { signal }: QueryOptions = {}
    ): Promise<OrmRecord> {
        const query_set = predicate ? this.filter(predicate) : this
        const records = await execute_query(
            this.context,
            { ...query_set.spec, limit: 2 },
            signal
        )

        const [record] = records
        if (record === undefined) {
            throw new NoMatchError(this.spec.model)
        }
        if (records.length > 1) {
            throw new MultipleMatchesError(this.spec.model)
        }

        return record
    }

    async count({ signal }: QueryOptions = {}): Promise<number> {
        return execute_count(this.context, this.spec, signal)
    }

    async exists({ signal }: QueryOptions = {}): Promise<boolean> {
        const keys = await get_matching_keys(
            this.context,
            { ...this.spec, limit: 1 },
            signal
        )
        return keys.length > 0
    }

    /**
     * Sets fields on every matching record in one statement, without hooks
     * @returns the number of updated rows
     */
    async update(values: OrmRecord, options: BulkOptions = {}) {
        return bulk_update(this.context, this.spec, values, options)
    }

    /**
     * Deletes every matching record in one statement, without hooks
     * @returns the number of deleted rows
     */
    async delete(options: BulkOptions = {}) {
        return bulk_delete(this.context, this.spec, options)
    }
}
