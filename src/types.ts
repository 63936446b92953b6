export type Path = (string | number)[]

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue }

/**
 * A single column value as seen by application code, after the validation layer has coerced it
 */
export type FieldValue = JsonValue | Date

/**
 * A hydrated or user supplied record. Field values sit next to eagerly loaded relations, which are
 * either a nested record, null, or an array of records.
 */
export type OrmRecord = { [key: string]: RecordValue }

export type RecordValue = FieldValue | OrmRecord | OrmRecord[] | undefined

/**
 * A raw row as returned by a database driver
 */
export type Row = Record<string, unknown>

export type Dialect = 'sqlite' | 'mysql' | 'postgres'
