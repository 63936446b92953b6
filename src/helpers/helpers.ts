import { OrmRecord } from '../types'

// from https://stackoverflow.com/a/16608074
export const is_simple_object = (
    val: unknown
): val is Record<string, unknown> =>
    typeof val === 'object' &&
    val !== null &&
    !Array.isArray(val) &&
    (Object.getPrototypeOf(val) === Object.prototype ||
        Object.getPrototypeOf(val) === null ||
        val.constructor?.name === 'RowDataPacket')

export const is_record = (value: unknown): value is OrmRecord =>
    is_simple_object(value)

export const is_nill = (el: unknown): el is null | undefined =>
    el === null || el === undefined

export const is_one_of = <T extends string>(
    values: readonly T[],
    value: unknown
): value is T => values.some(el => el === value)

export const group_by = <T>(
    array: readonly T[],
    key_function: (item: T, i: number) => string
): Map<string, T[]> =>
    array.reduce((acc, item, i) => {
        const key = key_function(item, i)
        const group = acc.get(key)
        if (group) {
            group.push(item)
        } else {
            acc.set(key, [item])
        }
        return acc
    }, new Map<string, T[]>())

/**
 * BookTag -> book_tag
 */
export const to_snake_case = (name: string) =>
    name
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
        .toLowerCase()

/**
 * Stable string used as an index key for a single value or a compound key. Numbers and their string forms map
 * to the same key, since drivers disagree on whether integer columns come back as numbers or strings.
 */
export const to_index_key = (values: readonly unknown[]) =>
    values
        .map(value =>
            value instanceof Date
                ? value.toISOString()
                : typeof value === 'object' && value !== null
                ? JSON.stringify(value)
                : String(value)
        )
        .join('\u0000')
