import { CreateTable } from '../compiler/data_definition/create_table/compile_create_table'
import { Definition } from '../compiler/data_definition/definitions/compile_definition'
import { ConfigurationError } from '../helpers/error_handling'
import { toposort } from '../helpers/toposort'
import { ModelRegistry } from './model_registry'
import { get_model_field, ModelDescriptor } from './schema_types'

const get_column_definitions = (model: ModelDescriptor): Definition[] => {
    const has_single_primary_key = model.primary_key.length === 1
    return model.fields.map(field => ({
        name: field.column,
        data_type: field.type,
        max_length: field.max_length,
        precision: field.precision,
        scale: field.scale,
        not_null: !field.nullable,
        auto_increment: field.auto_increment,
        primary_key: has_single_primary_key && field.primary_key,
        unique: field.unique && !field.primary_key,
        default: field.server_default,
    }))
}

const get_constraint_definitions = (
    registry: ModelRegistry,
    model: ModelDescriptor
): Definition[] => {
    const primary_key: Definition[] =
        model.primary_key.length > 1
            ? [
                  {
                      constraint: 'primary_key',
                      columns: model.primary_key.map(
                          field_name => get_model_field(model, field_name).column
                      ),
                  },
              ]
            : []

    const unique_keys: Definition[] = model.unique_together.map(field_names => ({
        constraint: 'unique_key',
        columns: field_names.map(
            field_name => get_model_field(model, field_name).column
        ),
    }))

    const foreign_keys = model.fields.flatMap((field): Definition[] => {
        const { foreign_key } = field
        if (!foreign_key) {
            return []
        }
        const target = registry.get_model(foreign_key.model)
        return [
            {
                constraint: 'foreign_key',
                columns: [field.column],
                referenced_table: target.table,
                referenced_columns: [
                    get_model_field(target, foreign_key.field).column,
                ],
                on_delete: foreign_key.on_delete,
            },
        ]
    })

    return [...primary_key, ...unique_keys, ...foreign_keys]
}

/**
 * Orders models so that every table is created after the tables its foreign keys reference
 */
const get_creation_order = (models: readonly ModelDescriptor[]) => {
    const dependents: Record<string, string[]> = {}
    models.forEach(model => {
        dependents[model.name] = dependents[model.name] ?? []
    })
    models.forEach(model => {
        model.fields.forEach(field => {
            const referenced = field.foreign_key?.model
            // a self reference can be created with the table itself
            if (referenced !== undefined && referenced !== model.name) {
                dependents[referenced] = [
                    ...(dependents[referenced] ?? []),
                    model.name,
                ]
            }
        })
    })

    try {
        return toposort(dependents).flat()
    } catch (error) {
        throw new ConfigurationError(
            `Cannot order table creation: ${
                error instanceof Error ? error.message : String(error)
            }`,
            { cause: error }
        )
    }
}

/**
 * CREATE TABLE statements for every registered model, including the associative models synthesized for
 * many-to-many relations, in foreign key dependency order
 */
export const get_create_table_statements = (
    registry: ModelRegistry,
    { if_not_exists = false }: { if_not_exists?: boolean } = {}
): CreateTable[] => {
    const models = registry.get_models()
    return get_creation_order(models).map(model_name => {
        const model = registry.get_model(model_name)
        return {
            create_table: model.table,
            if_not_exists,
            definitions: [
                ...get_column_definitions(model),
                ...get_constraint_definitions(registry, model),
            ],
        }
    })
}
