/**
 * The model registry turns model declarations into frozen {@link ModelDescriptor}s.
 *
 * Registration happens in two steps. Each declaration is validated and stored as a mutable draft straight away,
 * while its relations go to a pending list. A pending relation is resolved as soon as every model it needs is
 * registered, which is what lets models reference models declared after them (or themselves). Resolving a
 * relation fills in the foreign key type and synthesizes the reverse accessor on the target model, and for
 * many-to-many relations, the associative model.
 *
 * finalize() freezes the drafts. It is called explicitly at the end of startup, or implicitly by the first
 * lookup. After that the registry is read only until reset(), which only test harnesses should need.
 * @module
 */

import {
    ConfigurationError,
    throw_configuration_errors,
} from '../helpers/error_handling'
import { to_snake_case } from '../helpers/helpers'
import {
    get_declaration_shape_errors,
    get_reserved_name_errors,
} from './declaration_validation'
import {
    fields,
    FieldDeclaration,
    ManyToManyDeclaration,
    ModelDeclaration,
    RelationDeclaration,
    relations,
} from './field_types'
import {
    Cardinality,
    FieldDescriptor,
    ModelDescriptor,
    RelationDescriptor,
    ThroughDescriptor,
} from './schema_types'

type ModelDraft = {
    name: string
    table: string
    fields: FieldDescriptor[]
    primary_key: string[]
    relations: RelationDescriptor[]
    reverse_relations: RelationDescriptor[]
    unique_together: string[][]
    is_through: boolean
}

type PendingRelation = {
    model: string
    name: string
    declaration: RelationDeclaration
}

export type PendingRelationInfo = {
    model: string
    relation: string
    missing: string[]
}

export class ModelRegistry {
    private drafts = new Map<string, ModelDraft>()
    private abstracts = new Map<string, ModelDeclaration>()
    private pending: PendingRelation[] = []
    private models = new Map<string, ModelDescriptor>()
    private finalized = false

    get is_finalized() {
        return this.finalized
    }

    register_model(declaration: ModelDeclaration) {
        if (this.finalized) {
            throw new ConfigurationError(
                `Cannot register ${declaration.name}: the model registry is already finalized.`,
                {
                    model: declaration.name,
                    recommendation:
                        'Register every model during startup, before the first query.',
                }
            )
        }

        throw_configuration_errors(get_declaration_shape_errors(declaration), {
            model: declaration.name,
        })

        this.check_model_name_available(declaration.name)
        const merged = this.merge_abstract_bases(declaration)

        if (merged.abstract) {
            this.abstracts.set(merged.name, merged)
            return
        }

        this.add_draft(merged, false)
        this.resolve_pending()
    }

    /**
     * Freezes every model. Fails if any relation still references a model that was never registered.
     */
    finalize() {
        if (this.finalized) {
            return
        }

        const unresolved = this.get_pending_relations()
        throw_configuration_errors(
            unresolved.map(
                ({ model, relation, missing }) =>
                    `${model}.${relation} references ${missing.join(
                        ' and '
                    )}, which ${
                        missing.length > 1 ? 'are' : 'is'
                    } not registered.`
            )
        )

        this.drafts.forEach(draft =>
            this.models.set(draft.name, freeze_draft(draft))
        )
        this.finalized = true
    }

    /**
     * Clears every registered model. Meant for test harnesses.
     */
    reset() {
        this.drafts = new Map()
        this.abstracts = new Map()
        this.pending = []
        this.models = new Map()
        this.finalized = false
    }

    has_model(name: string) {
        return this.drafts.has(name)
    }

    get_model(name: string): ModelDescriptor {
        this.finalize()
        const model = this.models.get(name)
        if (!model) {
            const recommendation = this.abstracts.has(name)
                ? `${name} is abstract and has no table.`
                : undefined
            throw new ConfigurationError(`Unknown model ${name}.`, {
                model: name,
                recommendation,
            })
        }

        return model
    }

    get_models(): ModelDescriptor[] {
        this.finalize()
        return [...this.models.values()]
    }

    get_model_by_table(table: string): ModelDescriptor | undefined {
        return this.get_models().find(model => model.table === table)
    }

    get_pending_relations(): PendingRelationInfo[] {
        return this.pending.map(({ model, name, declaration }) => ({
            model,
            relation: name,
            missing: get_required_models(declaration).filter(
                required => !this.drafts.has(required)
            ),
        }))
    }

    private check_model_name_available(name: string) {
        if (this.drafts.has(name) || this.abstracts.has(name)) {
            throw new ConfigurationError(
                `A model named ${name} is already registered.`,
                { model: name }
            )
        }
    }

    private merge_abstract_bases(
        declaration: ModelDeclaration
    ): ModelDeclaration {
        const bases = (declaration.extends ?? []).map(base_name => {
            const base = this.abstracts.get(base_name)
            if (!base) {
                throw new ConfigurationError(
                    `${declaration.name} extends ${base_name}, which is not a registered abstract model.`,
                    { model: declaration.name }
                )
            }
            return base
        })

        const merged_relations: Record<string, RelationDeclaration> = {}
        const relation_sources: Record<string, string> = {}
        const add_relations = (
            owner: string,
            declared: ModelDeclaration['relations']
        ) =>
            Object.entries(declared ?? {}).forEach(([name, relation]) => {
                if (relation_sources[name] !== undefined) {
                    throw new ConfigurationError(
                        `${declaration.name}: relation ${name} is declared by both ${relation_sources[name]} and ${owner}. Relations cannot be redefined.`,
                        { model: declaration.name, path: [name] }
                    )
                }
                relation_sources[name] = owner
                merged_relations[name] = relation
            })

        bases.forEach(base => add_relations(base.name, base.relations))
        add_relations(declaration.name, declaration.relations)

        return {
            ...declaration,
            fields: Object.assign(
                {},
                ...bases.map(base => base.fields),
                declaration.fields
            ),
            relations: merged_relations,
            unique_together: [
                ...bases.flatMap(base => base.unique_together ?? []),
                ...(declaration.unique_together ?? []),
            ],
        }
    }

    private add_draft(declaration: ModelDeclaration, is_through: boolean) {
        const { name } = declaration
        const declared_fields = Object.entries(declaration.fields)
        const declared_relations = Object.entries(declaration.relations ?? {})
        const table = declaration.table ?? `${to_snake_case(name)}s`

        const errors: string[] = []
        const colliding_draft = [...this.drafts.values()].find(
            draft => draft.table === table
        )
        if (colliding_draft) {
            errors.push(
                `${name}: table ${table} is already used by ${colliding_draft.name}.`
            )
        }

        const foreign_key_fields = declared_relations.flatMap(
            ([relation_name, relation]) =>
                relation.kind === 'many_to_many'
                    ? []
                    : [
                          get_foreign_key_placeholder(
                              relation.field ?? `${relation_name}_id`,
                              relation.column,
                              relation.to,
                              relation.kind === 'one_to_one',
                              relation.nullable ?? true
                          ),
                      ]
        )
        const field_descriptors = [
            ...declared_fields.map(([field_name, field]) =>
                to_field_descriptor(field_name, field)
            ),
            ...foreign_key_fields,
        ]

        errors.push(
            ...get_reserved_name_errors(name, [
                ...field_descriptors.map(field => field.name),
                ...declared_relations.map(([relation_name]) => relation_name),
            ]),
            ...get_duplicate_name_errors(
                name,
                field_descriptors.map(field => field.name),
                declared_relations.map(([relation_name]) => relation_name)
            ),
            ...get_duplicate_column_errors(name, field_descriptors)
        )

        const primary_key = field_descriptors
            .filter(field => field.primary_key)
            .map(field => field.name)
        if (primary_key.length === 0) {
            errors.push(`${name} does not declare a primary key.`)
        }

        const field_names = new Set(field_descriptors.map(field => field.name))
        ;(declaration.unique_together ?? []).forEach(columns =>
            columns
                .filter(column => !field_names.has(column))
                .forEach(column =>
                    errors.push(
                        `${name}: unique_together references ${column}, which is not a field.`
                    )
                )
        )

        throw_configuration_errors(errors, { model: name })

        this.drafts.set(name, {
            name,
            table,
            fields: field_descriptors,
            primary_key,
            relations: [],
            reverse_relations: [],
            unique_together: (declaration.unique_together ?? []).map(
                columns => [...columns]
            ),
            is_through,
        })

        declared_relations.forEach(([relation_name, relation]) => {
            if (this.abstracts.has(relation.to)) {
                throw new ConfigurationError(
                    `${name}.${relation_name} references ${relation.to}, which is abstract.`,
                    { model: name, path: [relation_name] }
                )
            }
            this.pending.push({
                model: name,
                name: relation_name,
                declaration: relation,
            })
        })
    }

    private resolve_pending() {
        let progress = true
        while (progress) {
            progress = false
            for (const item of [...this.pending]) {
                if (this.can_resolve(item)) {
                    this.pending = this.pending.filter(el => el !== item)
                    this.resolve_relation(item)
                    progress = true
                }
            }
        }
    }

    private can_resolve({ declaration }: PendingRelation) {
        const required_models = get_required_models(declaration)
        const all_registered = required_models.every(model =>
            this.drafts.has(model)
        )
        // a custom through model is only usable once its own foreign keys are resolved
        const through_ready =
            declaration.kind !== 'many_to_many' ||
            declaration.through === undefined ||
            !this.pending.some(el => el.model === declaration.through)

        return all_registered && through_ready
    }

    private resolve_relation(item: PendingRelation) {
        const { declaration } = item
        if (declaration.kind === 'many_to_many') {
            this.resolve_many_to_many(item, declaration)
            return
        }

        const source = this.get_draft(item.model)
        const target = this.get_draft(declaration.to)
        const target_primary_key = get_single_primary_key(target, item)
        const foreign_key_name = declaration.field ?? `${item.name}_id`
        const foreign_key_index = source.fields.findIndex(
            field => field.name === foreign_key_name
        )
        const placeholder = source.fields[foreign_key_index]

        const foreign_key_field: FieldDescriptor = {
            ...placeholder,
            type: target_primary_key.type,
            max_length: target_primary_key.max_length,
            precision: target_primary_key.precision,
            scale: target_primary_key.scale,
            foreign_key: {
                model: target.name,
                field: target_primary_key.name,
                on_delete: declaration.on_delete,
            },
        }
        source.fields[foreign_key_index] = foreign_key_field

        const cardinality: Cardinality =
            declaration.kind === 'one_to_one' ? 'ONE_TO_ONE' : 'MANY_TO_ONE'
        const reverse_name = get_reverse_name(
            declaration.related_name,
            source.name,
            cardinality
        )

        source.relations.push({
            name: item.name,
            source_model: source.name,
            target_model: target.name,
            cardinality,
            from_field: foreign_key_name,
            to_field: target_primary_key.name,
            reverse_name,
            is_reverse: false,
            nullable: foreign_key_field.nullable,
        })

        if (reverse_name !== undefined) {
            this.check_accessor_available(target, reverse_name, item)
            target.reverse_relations.push({
                name: reverse_name,
                source_model: target.name,
                target_model: source.name,
                cardinality:
                    cardinality === 'ONE_TO_ONE' ? 'ONE_TO_ONE' : 'ONE_TO_MANY',
                from_field: target_primary_key.name,
                to_field: foreign_key_name,
                reverse_name: item.name,
                is_reverse: true,
                nullable: true,
            })
        }
    }

    private resolve_many_to_many(
        item: PendingRelation,
        declaration: ManyToManyDeclaration
    ) {
        const source = this.get_draft(item.model)
        const target = this.get_draft(declaration.to)
        const source_primary_key = get_single_primary_key(source, item)
        const target_primary_key = get_single_primary_key(target, item)

        this.check_accessor_available(source, item.name, item)

        const through =
            declaration.through === undefined
                ? this.add_through_model(source, target, item.name)
                : get_through_descriptor(
                      this.get_draft(declaration.through),
                      source,
                      target,
                      declaration,
                      item
                  )

        const reverse_name = get_reverse_name(
            declaration.related_name,
            source.name,
            'MANY_TO_MANY'
        )

        source.relations.push({
            name: item.name,
            source_model: source.name,
            target_model: target.name,
            cardinality: 'MANY_TO_MANY',
            from_field: source_primary_key.name,
            to_field: target_primary_key.name,
            through,
            reverse_name,
            is_reverse: false,
            nullable: true,
        })

        if (reverse_name !== undefined) {
            this.check_accessor_available(target, reverse_name, item)
            target.reverse_relations.push({
                name: reverse_name,
                source_model: target.name,
                target_model: source.name,
                cardinality: 'MANY_TO_MANY',
                from_field: target_primary_key.name,
                to_field: source_primary_key.name,
                through: {
                    model: through.model,
                    source_field: through.target_field,
                    target_field: through.source_field,
                },
                reverse_name: item.name,
                is_reverse: true,
                nullable: true,
            })
        }
    }

    /**
     * Registers the associative model for a many-to-many relation that did not name one. Both linked models
     * already exist, so its foreign keys are resolved on the spot.
     */
    private add_through_model(
        source: ModelDraft,
        target: ModelDraft,
        relation_name: string
    ): ThroughDescriptor {
        const name = `${source.name}${to_pascal_case(relation_name)}`
        this.check_model_name_available(name)

        const source_snake = to_snake_case(source.name)
        const target_snake = to_snake_case(target.name)
        const is_self_referential = source.name === target.name
        const source_relation = is_self_referential
            ? `from_${source_snake}`
            : source_snake
        const target_relation = is_self_referential
            ? `to_${target_snake}`
            : target_snake

        this.add_draft(
            {
                name,
                table: `${source.table}_${relation_name}`,
                fields: {
                    id: fields.integer({ primary_key: true }),
                },
                relations: {
                    [source_relation]: relations.foreign_key(source.name, {
                        related_name: false,
                        nullable: false,
                        on_delete: 'cascade',
                    }),
                    [target_relation]: relations.foreign_key(target.name, {
                        related_name: false,
                        nullable: false,
                        on_delete: 'cascade',
                    }),
                },
                unique_together: [
                    [`${source_relation}_id`, `${target_relation}_id`],
                ],
            },
            true
        )

        this.pending
            .filter(el => el.model === name)
            .forEach(el => {
                this.pending = this.pending.filter(other => other !== el)
                this.resolve_relation(el)
            })

        return {
            model: name,
            source_field: `${source_relation}_id`,
            target_field: `${target_relation}_id`,
        }
    }

    private check_accessor_available(
        model: ModelDraft,
        accessor: string,
        origin: PendingRelation
    ) {
        const taken =
            model.fields.some(field => field.name === accessor) ||
            model.relations.some(relation => relation.name === accessor) ||
            model.reverse_relations.some(relation => relation.name === accessor) ||
            this.pending.some(
                el => el.model === model.name && el.name === accessor
            )

        if (taken) {
            throw new ConfigurationError(
                `${model.name}.${accessor}, synthesized for ${origin.model}.${origin.name}, collides with an existing field or relation.`,
                {
                    model: model.name,
                    path: [accessor],
                    recommendation:
                        'Set related_name to another name, or to false to skip the reverse accessor.',
                }
            )
        }
    }

    private get_draft(name: string) {
        const draft = this.drafts.get(name)
        if (!draft) {
            throw new ConfigurationError(`Unknown model ${name}.`, {
                model: name,
            })
        }
        return draft
    }
}

const get_required_models = (declaration: RelationDeclaration) =>
    declaration.kind === 'many_to_many' && declaration.through !== undefined
        ? [declaration.to, declaration.through]
        : [declaration.to]

const to_pascal_case = (name: string) =>
    name
        .split('_')
        .map(part => part.charAt(0).toUpperCase() + part.slice(1))
        .join('')

const get_reverse_name = (
    related_name: string | false | undefined,
    source_model: string,
    cardinality: Cardinality
) => {
    if (related_name === false) {
        return undefined
    }
    if (related_name !== undefined) {
        return related_name
    }

    const snake_name = to_snake_case(source_model)
    return cardinality === 'ONE_TO_ONE' ? snake_name : `${snake_name}s`
}

const to_default_provider = (
    default_value: FieldDeclaration['default']
): FieldDescriptor['default'] => {
    if (default_value === undefined) {
        return undefined
    }
    if (typeof default_value === 'function') {
        return default_value
    }

    return () => structuredClone(default_value)
}

const to_field_descriptor = (
    name: string,
    field: FieldDeclaration
): FieldDescriptor => {
    const primary_key = field.primary_key ?? false
    return {
        name,
        column: field.column ?? name,
        type: field.type,
        nullable: primary_key ? false : field.nullable ?? false,
        primary_key,
        auto_increment:
            field.auto_increment ?? (primary_key && field.type === 'integer'),
        unique: field.unique ?? false,
        default: to_default_provider(field.default),
        server_default: field.server_default,
        max_length: field.max_length,
        precision: field.precision,
        scale: field.scale,
        choices: field.choices,
    }
}

/**
 * The foreign key type is only known once the target is registered, so the field starts out as an integer and
 * is replaced when the relation resolves
 */
const get_foreign_key_placeholder = (
    name: string,
    column: string | undefined,
    target: string,
    unique: boolean,
    nullable: boolean
): FieldDescriptor => ({
    name,
    column: column ?? name,
    type: 'integer',
    nullable,
    primary_key: false,
    auto_increment: false,
    unique,
    foreign_key: { model: target, field: '' },
})

const get_duplicate_name_errors = (
    model: string,
    field_names: string[],
    relation_names: string[]
) => {
    const seen = new Set<string>()
    return [...field_names, ...relation_names].flatMap(name => {
        if (seen.has(name)) {
            return [
                `${model}: ${name} is declared more than once as a field or relation name.`,
            ]
        }
        seen.add(name)
        return []
    })
}

const get_duplicate_column_errors = (
    model: string,
    field_descriptors: FieldDescriptor[]
) => {
    const seen = new Set<string>()
    return field_descriptors.flatMap(field => {
        if (seen.has(field.column)) {
            return [`${model}: column ${field.column} is used by more than one field.`]
        }
        seen.add(field.column)
        return []
    })
}

const get_single_primary_key = (model: ModelDraft, origin: PendingRelation) => {
    const primary_key_fields = model.fields.filter(field => field.primary_key)
    if (primary_key_fields.length !== 1) {
        throw new ConfigurationError(
            `${origin.model}.${origin.name}: relations need ${model.name} to have exactly one primary key field.`,
            { model: origin.model, path: [origin.name] }
        )
    }

    return primary_key_fields[0]
}

const get_through_descriptor = (
    through: ModelDraft,
    source: ModelDraft,
    target: ModelDraft,
    declaration: ManyToManyDeclaration,
    origin: PendingRelation
): ThroughDescriptor => {
    const to_one_relations = through.relations.filter(
        relation =>
            relation.cardinality === 'MANY_TO_ONE' ||
            relation.cardinality === 'ONE_TO_ONE'
    )

    const find_link = (model: ModelDraft, relation_name: string | undefined) => {
        const candidates = to_one_relations.filter(
            relation =>
                relation.target_model === model.name &&
                (relation_name === undefined || relation.name === relation_name)
        )

        if (candidates.length !== 1) {
            throw new ConfigurationError(
                `${origin.model}.${origin.name}: expected exactly one relation from ${through.name} to ${model.name}, found ${candidates.length}.`,
                {
                    model: origin.model,
                    path: [origin.name],
                    recommendation:
                        'Name the two relations of the through model with through_fields.',
                }
            )
        }

        return candidates[0]
    }

    const [source_relation_name, target_relation_name] =
        declaration.through_fields ?? [undefined, undefined]

    if (source.name === target.name && !declaration.through_fields) {
        throw new ConfigurationError(
            `${origin.model}.${origin.name}: self-referential many-to-many relations with a custom through model need through_fields.`,
            { model: origin.model, path: [origin.name] }
        )
    }

    return {
        model: through.name,
        source_field: find_link(source, source_relation_name).from_field,
        target_field: find_link(target, target_relation_name).from_field,
    }
}

const freeze_draft = (draft: ModelDraft): ModelDescriptor =>
    Object.freeze({
        name: draft.name,
        table: draft.table,
        fields: Object.freeze(
            draft.fields.map(field =>
                Object.freeze({
                    ...field,
                    choices: field.choices && Object.freeze([...field.choices]),
                    foreign_key:
                        field.foreign_key && Object.freeze({ ...field.foreign_key }),
                })
            )
        ),
        primary_key: Object.freeze([...draft.primary_key]),
        relations: Object.freeze(draft.relations.map(freeze_relation)),
        reverse_relations: Object.freeze(
            draft.reverse_relations.map(freeze_relation)
        ),
        unique_together: Object.freeze(
            draft.unique_together.map(columns => Object.freeze([...columns]))
        ),
        is_through: draft.is_through,
    })

const freeze_relation = (relation: RelationDescriptor): RelationDescriptor =>
    Object.freeze({
        ...relation,
        through: relation.through && Object.freeze({ ...relation.through }),
    })
