/**
 * Runs a query: the root statement first, then the prefetch tiers in order. Every tier is parameterized by
 * keys read from the rows of the tiers before it, so tiers never overlap. Statements inside one tier do not
 * depend on each other and go to the driver in one batch when concurrent_prefetch is on.
 * @module
 */

import { compile_statement } from '../compiler/compiler'
import { Select } from '../compiler/query/compile_select'
import { TesseraConfig } from '../config/config'
import { Driver } from '../helpers/database_adapters'
import {
    QueryExecutionError,
    throw_if_aborted,
} from '../helpers/error_handling'
import { is_nill, to_index_key } from '../helpers/helpers'
import { Logger } from '../helpers/logger'
import { ModelRegistry } from '../schema/model_registry'
import { OrmRecord, Row } from '../types'
import { hydrate } from './hydrate'
import { build_load_plan, get_row_owner, LoadNode } from './load_plan'
import { QuerySpec } from './query_types'
import {
    build_count_select,
    build_key_select,
    build_prefetch_select,
    build_root_select,
} from './statement_builder'

export type QueryContext = {
    readonly registry: ModelRegistry
    readonly driver: Driver
    readonly logger: Logger
    readonly config: TesseraConfig
}

type Execution = {
    readonly context: QueryContext
    readonly model: string
    readonly signal?: AbortSignal
}

/**
 * Sends select statements to the driver. Driver failures become QueryExecutionErrors naming the model and
 * relation path that was being loaded, and the signal is checked once the rows are back.
 */
const run_selects = async (
    { context, model, signal }: Execution,
    statements: readonly { select: Select; path: readonly string[] }[]
): Promise<Row[][]> => {
    const { driver } = context
    const compiled = statements.map(({ select }) =>
        compile_statement(select, driver.dialect)
    )

    let results: Row[][]
    try {
        results = await driver.query(compiled)
    } catch (error) {
        const path = statements[0]?.path ?? []
        throw new QueryExecutionError(
            `Query on ${model}${
                path.length > 0 ? ` (loading ${path.join('.')})` : ''
            } failed: ${error instanceof Error ? error.message : String(error)}`,
            { model, path: [...path], cause: error }
        )
    }

    throw_if_aborted(signal)
    return results
}

/**
 * Distinct, non null link values a prefetch node filters by, read from the rows of the node they hang off
 */
const get_parent_keys = (
    node: LoadNode,
    rows_by_node: ReadonlyMap<LoadNode, readonly Row[]>
) => {
    const parent = node.parent
    const relation = node.relation
    if (!parent || !relation) {
        return []
    }

    const owner_rows = rows_by_node.get(get_row_owner(parent)) ?? []
    const key_alias = `${parent.column_prefix}${relation.from_field}`
    const keys = new Map<string, unknown>()
    owner_rows.forEach(row => {
        const key = row[key_alias]
        if (!is_nill(key)) {
            keys.set(to_index_key([key]), key)
        }
    })

    return [...keys.values()]
}

const run_prefetch_tier = async (
    execution: Execution,
    tier: readonly LoadNode[],
    rows_by_node: Map<LoadNode, readonly Row[]>
) => {
    const { registry, config } = execution.context
    const pending: { node: LoadNode; select: Select; path: readonly string[] }[] =
        []

    tier.forEach(node => {
        const keys = get_parent_keys(node, rows_by_node)
        if (keys.length === 0) {
            // nothing to match, so no round trip
            rows_by_node.set(node, [])
        } else {
            pending.push({
                node,
                select: build_prefetch_select(registry, node, keys),
                path: node.path,
            })
        }
    })

    if (pending.length === 0) {
        return
    }

    if (config.concurrent_prefetch) {
        const results = await run_selects(execution, pending)
        pending.forEach(({ node }, i) => rows_by_node.set(node, results[i] ?? []))
        return
    }

    for (const item of pending) {
        const [rows] = await run_selects(execution, [item])
        rows_by_node.set(item.node, rows ?? [])
    }
}

/**
 * Fetches and hydrates the records a query spec describes
 */
export const execute_query = async (
    context: QueryContext,
    spec: QuerySpec,
    signal?: AbortSignal
): Promise<OrmRecord[]> => {
    throw_if_aborted(signal)
    const { registry, driver, logger } = context
    const execution: Execution = { context, model: spec.model, signal }

    const plan = build_load_plan(registry, spec)
    const root_select = build_root_select(registry, spec, plan, driver.dialect)
    const [root_rows = []] = await run_selects(execution, [
        { select: root_select, path: [] },
    ])

    if (root_rows.length === 0) {
        return []
    }

    const rows_by_node = new Map<LoadNode, readonly Row[]>([
        [plan.root, root_rows],
    ])
    for (const tier of plan.prefetch_tiers) {
        await run_prefetch_tier(execution, tier, rows_by_node)
    }

    logger.trace(
        {
            model: spec.model,
            root_rows: root_rows.length,
            prefetch_tiers: plan.prefetch_tiers.length,
        },
        'hydrating query results'
    )

    return hydrate(plan, root_rows, rows_by_node)
}

const to_count = (value: unknown) => {
    const count = Number(value)
    if (!Number.isInteger(count)) {
        throw new QueryExecutionError(
            `Count query returned a non integer value: ${String(value)}`
        )
    }
    return count
}

/**
 * Number of rows matching the filter. A limit or offset on the QuerySpec caps the count the same way it would cap
 * the rows of all().
 */
export const execute_count = async (
    context: QueryContext,
    spec: QuerySpec,
    signal?: AbortSignal
): Promise<number> => {
    throw_if_aborted(signal)
    const select = build_count_select(
        context.registry,
        spec,
        context.driver.dialect
    )
    const [rows = []] = await run_selects(
        { context, model: spec.model, signal },
        [{ select, path: [] }]
    )

    const total = to_count(rows[0]?.count ?? 0)
    const after_offset = Math.max(total - (spec.offset ?? 0), 0)
    return spec.limit === undefined
        ? after_offset
        : Math.min(after_offset, spec.limit)
}

/**
 * Primary key rows of the records matching a QuerySpec, in its order
 */
export const get_matching_keys = async (
    context: QueryContext,
    spec: QuerySpec,
    signal?: AbortSignal
): Promise<Row[]> => {
    throw_if_aborted(signal)
    const select = build_key_select(
        context.registry,
        spec,
        context.driver.dialect
    )
    const [rows = []] = await run_selects(
        { context, model: spec.model, signal },
        [{ select, path: [] }]
    )
    return rows
}
