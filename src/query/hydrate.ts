import { HydrationError, ValidationError } from '../helpers/error_handling'
import { group_by, is_nill, to_index_key } from '../helpers/helpers'
import { is_to_many } from '../schema/schema_types'
import { OrmRecord, Row } from '../types'
import { validate_record } from '../validation/record_validation'
import { get_primary_key_aliases, LoadNode, LoadPlan } from './load_plan'
import { parent_key_alias } from './statement_builder'

export type PrefetchRows = ReadonlyMap<LoadNode, readonly Row[]>

const build_record = (node: LoadNode, row: Row): OrmRecord => {
    const values: Row = {}
    node.fields.forEach(field => {
        values[field.name] = row[`${node.column_prefix}${field.name}`]
    })

    try {
        return validate_record(node.model, values, 'hydrate')
    } catch (error) {
        if (error instanceof ValidationError) {
            throw new HydrationError(
                `Could not build ${node.model.name} from row data: ${error.message}`,
                { model: node.model.name, path: [...node.path], cause: error }
            )
        }
        throw error
    }
}

const get_row_key = (node: LoadNode, row: Row) =>
    to_index_key(get_primary_key_aliases(node).map(alias => row[alias]))

/**
 * A left joined model whose columns are all null was not there
 */
const is_missing_join = (node: LoadNode, row: Row) =>
    node.selected_fields.every(field =>
        is_nill(row[`${node.column_prefix}${field.name}`])
    )

/**
 * Rows with the same primary key describe the same record, only the first one is kept
 */
const deduplicate_rows = (node: LoadNode, rows: readonly Row[]) => {
    const seen = new Set<string>()
    return rows.filter(row => {
        const key = get_row_key(node, row)
        if (seen.has(key)) {
            return false
        }
        seen.add(key)
        return true
    })
}

/**
 * Rebuilds nested records from the rows of a query. Root rows carry the root model and every joined model,
 * prefetched rows are matched to their parents by the link value in {@link parent_key_alias}. Relations that
 * were not requested are left off the records.
 *
 * @throws HydrationError when a row does not validate against its model
 */
export const hydrate = (
    plan: LoadPlan,
    root_rows: readonly Row[],
    prefetch_rows: PrefetchRows
): OrmRecord[] => {
    const prefetch_groups = new Map<LoadNode, Map<string, OrmRecord[]>>()
    const attached = new WeakSet<OrmRecord>()

    // a record that belongs to several parents is copied, so every parent owns its own object
    const attach = (record: OrmRecord) => {
        if (attached.has(record)) {
            return { ...record }
        }
        attached.add(record)
        return record
    }

    const get_prefetch_group = (node: LoadNode, parent_key: unknown) => {
        let groups = prefetch_groups.get(node)
        if (!groups) {
            const rows = prefetch_rows.get(node) ?? []
            const rows_by_parent = group_by(rows, row =>
                to_index_key([row[parent_key_alias]])
            )
            groups = new Map(
                [...rows_by_parent.entries()].map(([key, group_rows]) => [
                    key,
                    deduplicate_rows(node, group_rows).map(row =>
                        build_node(node, row)
                    ),
                ])
            )
            prefetch_groups.set(node, groups)
        }

        return is_nill(parent_key)
            ? []
            : groups.get(to_index_key([parent_key])) ?? []
    }

    const build_node = (node: LoadNode, row: Row): OrmRecord => {
        const record = build_record(node, row)
        node.children.forEach(child => {
            const relation = child.relation
            if (!relation) {
                return
            }

            if (child.kind === 'join') {
                record[relation.name] = is_missing_join(child, row)
                    ? null
                    : build_node(child, row)
                return
            }

            const group = get_prefetch_group(
                child,
                row[`${node.column_prefix}${relation.from_field}`]
            ).map(attach)
            record[relation.name] = is_to_many(relation)
                ? group
                : group[0] ?? null
        })

        return record
    }

    return deduplicate_rows(plan.root, root_rows).map(row =>
        build_node(plan.root, row)
    )
}
