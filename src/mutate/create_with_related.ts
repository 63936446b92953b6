/**
 * Inserts a nested record tree in one transaction. The tree is flattened into pieces, one per record (plus one
 * per associative row of a many-to-many link), the pieces are ordered so that every record is inserted after
 * the records its foreign keys point at, and generated keys are copied into the dependent pieces as the
 * inserts go.
 * @module
 */

import {
    CancellationError,
    ConfigurationError,
    PersistenceError,
    throw_if_aborted,
} from '../helpers/error_handling'
import { is_nill, is_record } from '../helpers/helpers'
import { toposort } from '../helpers/toposort'
import {
    get_primary_key_fields,
    ModelDescriptor,
    RelationDescriptor,
} from '../schema/schema_types'
import { ModelRegistry } from '../schema/model_registry'
import { OrmRecord, Path, RecordValue } from '../types'
import { HookContext } from './hooks'
import {
    insert_record,
    run_after_hooks,
    run_before_hooks,
    SaveContext,
} from './save'

type KeyAssignment = {
    readonly from_piece: number
    readonly from_field: string
    readonly to_field: string
}

export type MutationPiece = {
    readonly model: ModelDescriptor
    readonly record: OrmRecord
    /**
     * Where the record sits in the tree, e.g. ['books', 0, 'tags', 1]
     */
    readonly path: Path
    /**
     * Records referenced by an assigned primary key are linked to, not inserted
     */
    readonly existing: boolean
    /**
     * Foreign key values to copy from other pieces right before the insert
     */
    readonly key_assignments: KeyAssignment[]
}

type FlatMutation = {
    pieces: MutationPiece[]
    /**
     * Piece index to the indices of pieces that must be inserted after it
     */
    dependents: Record<string, string[]>
}

const has_primary_key = (model: ModelDescriptor, record: OrmRecord) =>
    get_primary_key_fields(model).every(field => !is_nill(record[field.name]))

const to_record_list = (
    value: RecordValue,
    model: ModelDescriptor,
    relation: RelationDescriptor,
    path: Path
): OrmRecord[] => {
    const values = Array.isArray(value) ? value : [value]
    return values.map((el, i) => {
        if (!is_record(el)) {
            throw new ConfigurationError(
                `${model.name}.${relation.name} must hold related records.`,
                { model: model.name, path: [...path, relation.name, i] }
            )
        }
        return el
    })
}

/**
 * Flattens a record tree into pieces. Only relations present on a record are followed.
 */
export const flatten_record_tree = (
    registry: ModelRegistry,
    model_name: string,
    root: OrmRecord
): FlatMutation => {
    const pieces: MutationPiece[] = []
    const dependents: Record<string, string[]> = {}

    const add_piece = (piece: MutationPiece) => {
        pieces.push(piece)
        const index = pieces.length - 1
        dependents[index] = []
        return index
    }

    const add_dependency = (before: number, after: number) => {
        dependents[before].push(String(after))
    }

    const visit = (
        model: ModelDescriptor,
        record: OrmRecord,
        path: Path,
        existing: boolean
    ): number => {
        const index = add_piece({ model, record, path, existing, key_assignments: [] })
        const piece = pieces[index]

        const relations = [...model.relations, ...model.reverse_relations]
        relations.forEach(relation => {
            const value = record[relation.name]
            if (is_nill(value)) {
                return
            }

            const target_model = registry.get_model(relation.target_model)
            const related_records = to_record_list(value, model, relation, path)
            const related_path = (i: number): Path =>
                Array.isArray(value)
                    ? [...path, relation.name, i]
                    : [...path, relation.name]

            const through = relation.through
            if (through) {
                const through_model = registry.get_model(through.model)
                related_records.forEach((related, i) => {
                    const target_index = visit(
                        target_model,
                        related,
                        related_path(i),
                        has_primary_key(target_model, related)
                    )
                    const through_index = add_piece({
                        model: through_model,
                        record: {},
                        path: [...related_path(i), through_model.name],
                        existing: false,
                        key_assignments: [
                            {
                                from_piece: index,
                                from_field: relation.from_field,
                                to_field: through.source_field,
                            },
                            {
                                from_piece: target_index,
                                from_field: relation.to_field,
                                to_field: through.target_field,
                            },
                        ],
                    })
                    add_dependency(index, through_index)
                    add_dependency(target_index, through_index)
                })
                return
            }

            const is_parent =
                !relation.is_reverse &&
                (relation.cardinality === 'MANY_TO_ONE' ||
                    relation.cardinality === 'ONE_TO_ONE')

            related_records.forEach((related, i) => {
                if (is_parent) {
                    // the parent goes first and hands its key to this record
                    const parent_index = visit(
                        target_model,
                        related,
                        related_path(i),
                        has_primary_key(target_model, related)
                    )
                    piece.key_assignments.push({
                        from_piece: parent_index,
                        from_field: relation.to_field,
                        to_field: relation.from_field,
                    })
                    add_dependency(parent_index, index)
                } else {
                    const child_index = visit(
                        target_model,
                        related,
                        related_path(i),
                        false
                    )
                    pieces[child_index].key_assignments.push({
                        from_piece: index,
                        from_field: relation.from_field,
                        to_field: relation.to_field,
                    })
                    add_dependency(index, child_index)
                }
            })
        })

        return index
    }

    visit(registry.get_model(model_name), root, [], false)
    return { pieces, dependents }
}

const apply_key_assignments = (
    piece: MutationPiece,
    pieces: readonly MutationPiece[]
) => {
    piece.key_assignments.forEach(({ from_piece, from_field, to_field }) => {
        const value = pieces[from_piece]?.record[from_field]
        if (value !== undefined) {
            piece.record[to_field] = value
        }
    })
}

/**
 * Inserts a record together with the related records nested in it: to-one parents, to-many children and
 * many-to-many targets with their associative rows. Nested parents and many-to-many targets whose primary key
 * is set are linked to instead of inserted.
 *
 * Everything runs in one transaction, and nothing is kept when a statement or a before_save hook fails.
 * after_save hooks run once the transaction is committed.
 */
export const create_with_related = async (
    context: SaveContext,
    model_name: string,
    tree: OrmRecord,
    { signal }: { signal?: AbortSignal } = {}
): Promise<OrmRecord> => {
    throw_if_aborted(signal)
    const { registry, driver, hooks, logger } = context
    const { pieces, dependents } = flatten_record_tree(
        registry,
        model_name,
        tree
    )
    const batches = toposort(dependents)

    let inserted: { piece: MutationPiece; hook_context: HookContext }[]
    try {
        inserted = await driver.transaction(async transaction_driver => {
            const done: typeof inserted = []
            for (const batch of batches) {
                for (const index of batch) {
                    const piece = pieces[Number(index)]
                    if (piece.existing) {
                        continue
                    }

                    apply_key_assignments(piece, pieces)
                    const hook_context: HookContext = {
                        model: piece.model.name,
                        operation: 'insert',
                        driver: transaction_driver,
                    }
                    await run_before_hooks(
                        hooks,
                        'before_save',
                        piece.record,
                        hook_context
                    )
                    await insert_record(
                        transaction_driver,
                        piece.model,
                        piece.record
                    )
                    done.push({ piece, hook_context })
                }
            }
            throw_if_aborted(signal)
            return done
        })
    } catch (error) {
        if (
            error instanceof PersistenceError ||
            error instanceof CancellationError
        ) {
            throw error
        }
        throw new PersistenceError(
            `Could not create ${model_name} with related records: ${
                error instanceof Error ? error.message : String(error)
            }`,
            { model: model_name, cause: error }
        )
    }

    logger.debug(
        { model: model_name, inserted: inserted.length },
        'created record tree'
    )

    for (const { piece, hook_context } of inserted) {
        await run_after_hooks(context, 'after_save', piece.record, {
            ...hook_context,
            driver,
        })
    }

    return tree
}
