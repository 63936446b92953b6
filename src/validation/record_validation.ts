import { Schema, validate } from 'jsonschema'
import { FieldError, ValidationError } from '../helpers/error_handling'
import { is_nill, is_simple_object } from '../helpers/helpers'
import { FieldDescriptor, ModelDescriptor } from '../schema/schema_types'
import { Dialect, FieldValue, JsonValue, OrmRecord, Row } from '../types'

/**
 * insert requires every field the database cannot fill itself, update and hydrate only check the fields that
 * are present
 */
export type ValidationMode = 'insert' | 'update' | 'hydrate'

const date_pattern = '^\\d{4}-\\d{2}-\\d{2}$'

const get_field_schema = (field: FieldDescriptor): Schema => {
    const base_schema: Schema = (() => {
        switch (field.type) {
            case 'string':
                return { type: 'string', maxLength: field.max_length }
            case 'text':
                return { type: 'string' }
            case 'integer':
                return { type: 'integer' }
            case 'float':
            case 'decimal':
                return { type: 'number' }
            case 'boolean':
                return { type: 'boolean' }
            case 'date':
                return { type: 'string', pattern: date_pattern }
            case 'datetime':
                return { type: 'date' }
            case 'json':
                return {}
        }
    })()

    const with_choices: Schema = field.choices
        ? { ...base_schema, enum: [...field.choices] }
        : base_schema

    if (!field.nullable || field.type === 'json') {
        return with_choices
    }

    return { anyOf: [with_choices, { type: 'null' }] }
}

const is_database_filled = (field: FieldDescriptor) =>
    field.auto_increment ||
    field.nullable ||
    field.default !== undefined ||
    field.server_default !== undefined

export const get_record_schema = (
    model: ModelDescriptor,
    mode: ValidationMode
): Schema => ({
    type: 'object',
    properties: Object.fromEntries(
        model.fields.map(field => [field.name, get_field_schema(field)])
    ),
    required:
        mode === 'insert'
            ? model.fields
                  .filter(field => !is_database_filled(field))
                  .map(field => field.name)
            : [],
})

export const is_json_value = (value: unknown): value is JsonValue => {
    if (
        value === null ||
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean'
    ) {
        return true
    }
    if (Array.isArray(value)) {
        return value.every(is_json_value)
    }
    if (is_simple_object(value)) {
        return Object.values(value).every(is_json_value)
    }

    return false
}

const to_number = (value: unknown): unknown => {
    if (typeof value === 'bigint') {
        return Number(value)
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const number = Number(value)
        return Number.isNaN(number) ? value : number
    }

    return value
}

/**
 * Converts what a driver returns (or what application code passes in) into the field's logical type.
 * Values that cannot be converted are returned unchanged so validation reports them.
 */
export const coerce_field_value = (
    field: FieldDescriptor,
    value: unknown,
    from_database = false
): unknown => {
    if (is_nill(value)) {
        return value
    }

    switch (field.type) {
        case 'integer':
        case 'float':
        case 'decimal':
            return to_number(value)
        case 'boolean':
            if (value === 0 || value === 1 || value === '0' || value === '1') {
                return Number(value) === 1
            }
            return value
        case 'date':
            if (value instanceof Date) {
                return value.toISOString().slice(0, 10)
            }
            return value
        case 'datetime':
            if (typeof value === 'string' || typeof value === 'number') {
                const date = new Date(value)
                return Number.isNaN(date.getTime()) ? value : date
            }
            return value
        case 'json':
            // json columns come back as text from sqlite and mysql
            if (from_database && typeof value === 'string') {
                try {
                    const parsed: unknown = JSON.parse(value)
                    return parsed
                } catch (error) {
                    // a plain string is a valid json value too
                    return value
                }
            }
            return value
        default:
            return value
    }
}

const to_field_value = (value: unknown): FieldValue | undefined =>
    value instanceof Date || is_json_value(value) ? value : undefined

/**
 * Coerces and validates the given field values of a model.
 * @returns a new record holding only the model's fields that were present in values
 * @throws ValidationError listing every invalid field
 */
export const validate_record = (
    model: ModelDescriptor,
    values: Row | OrmRecord,
    mode: ValidationMode
): OrmRecord => {
    const coerced: Record<string, unknown> = {}
    model.fields.forEach(field => {
        if (values[field.name] !== undefined) {
            coerced[field.name] = coerce_field_value(
                field,
                values[field.name],
                mode === 'hydrate'
            )
        }
    })

    const { errors } = validate(coerced, get_record_schema(model, mode))
    const field_errors: FieldError[] = errors.map(error => ({
        field:
            error.name === 'required'
                ? String(error.argument)
                : error.property.replace(/^instance\.?/, ''),
        message: error.message,
    }))

    const record: OrmRecord = {}
    Object.entries(coerced).forEach(([field_name, value]) => {
        const field_value = to_field_value(value)
        if (field_value === undefined) {
            field_errors.push({
                field: field_name,
                message: 'is not a storable value',
            })
        } else {
            record[field_name] = field_value
        }
    })

    if (field_errors.length > 0) {
        throw new ValidationError(model.name, field_errors)
    }

    return record
}

const serialize_field_value = (
    field: FieldDescriptor,
    value: FieldValue,
    dialect: Dialect
): unknown => {
    if (value === null) {
        return null
    }

    switch (field.type) {
        case 'boolean':
            return dialect === 'sqlite' ? (value ? 1 : 0) : value
        case 'datetime':
            return dialect === 'sqlite' && value instanceof Date
                ? value.toISOString()
                : value
        case 'json':
            return JSON.stringify(value)
        default:
            return value
    }
}

/**
 * Prepares validated field values for a write, keyed by column name
 */
export const serialize_record = (
    model: ModelDescriptor,
    values: OrmRecord,
    dialect: Dialect
): Row => {
    const row: Row = {}
    model.fields.forEach(field => {
        const value = to_field_value(values[field.name])
        if (value !== undefined) {
            row[field.column] = serialize_field_value(field, value, dialect)
        }
    })

    return row
}

/**
 * Serializes a single value compared against a field in a filter
 */
export const serialize_filter_value = (
    field: FieldDescriptor,
    value: unknown,
    dialect: Dialect
): unknown => {
    const coerced = to_field_value(coerce_field_value(field, value))
    return coerced === undefined
        ? value
        : serialize_field_value(field, coerced, dialect)
}

/**
 * Fills fields left out of an inserted record from their default providers
 */
export const apply_defaults = (
    model: ModelDescriptor,
    values: OrmRecord
): OrmRecord => {
    const with_defaults: OrmRecord = { ...values }
    model.fields.forEach(field => {
        if (with_defaults[field.name] === undefined && field.default) {
            with_defaults[field.name] = field.default()
        }
    })

    return with_defaults
}
