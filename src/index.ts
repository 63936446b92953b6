// schema
export { ModelRegistry } from './schema/model_registry'
export {
    fields,
    relations,
    type ModelDeclaration,
    type FieldDeclaration,
    type RelationDeclaration,
    type OnDelete,
    type LogicalType,
} from './schema/field_types'
export {
    type ModelDescriptor,
    type FieldDescriptor,
    type RelationDescriptor,
    type Cardinality,
} from './schema/schema_types'
export {
    get_outgoing_relations,
    get_incoming_relations,
    get_relation,
    resolve_relation_path,
    split_field_path,
    type RelationPath,
} from './schema/relation_graph'
export { get_create_table_statements } from './schema/schema_ddl'

// query
export { QuerySet } from './query/query_set'
export {
    type Predicate,
    type QuerySpec,
    type QueryOptions,
    type BulkOptions,
    type OrderDirection,
} from './query/query_types'

// mutate
export { type Hook, type HookEvent, type HookContext } from './mutate/hooks'
export { type SaveOptions } from './mutate/save'

// database
export { Database, ModelManager, type DatabaseOptions } from './database'
export { load_config, type TesseraConfig } from './config/config'
export { create_logger } from './helpers/logger'
export { compile_statement, type Statement } from './compiler/compiler'
export { validate_record, serialize_record } from './validation/record_validation'
export * from './helpers/error_handling'
export { type OrmRecord, type FieldValue, type Dialect } from './types'

// adapters
export {
    sqljs_adapter,
    mysql2_adapter,
    pg_adapter,
    with_statement_logging,
    type Driver,
    type RunResult,
} from './helpers/database_adapters'
