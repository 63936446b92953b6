import { escape_identifier } from '../../helpers/escape'
import { CompilerArgs } from '../compiler'
import {
    compile_expression,
    Expression,
} from '../expression/compile_expression'
import { compile_where, Where } from './compile_where'

export type SelectItem = {
    readonly expression: Expression
    readonly as?: string
}

export type TableReference = {
    readonly table: string
    readonly as?: string
}

export type Join = TableReference & {
    readonly type: 'left' | 'inner'
    readonly on: Where
}

export type OrderBy = {
    readonly expression: Expression
    readonly direction: 'asc' | 'desc'
}

export type Select = {
    readonly select: readonly SelectItem[]
    readonly distinct?: boolean
    readonly from: TableReference
    readonly joins?: readonly Join[]
    readonly where?: Where
    readonly order_by?: readonly OrderBy[]
    readonly limit?: number
    readonly offset?: number
}

/**
 * Used in place of a limit when only an offset is given, since mysql and sqlite have no OFFSET without LIMIT
 */
const unbounded_limits = {
    sqlite: '-1',
    mysql: '18446744073709551615',
    postgres: 'ALL',
} as const

const compile_table_reference = (
    { table, as }: TableReference,
    dialect: CompilerArgs<unknown>['dialect']
) =>
    as === undefined
        ? escape_identifier(dialect, table)
        : `${escape_identifier(dialect, table)} ${escape_identifier(
              dialect,
              as
          )}`

export const compile_select = ({
    statement,
    dialect,
    params,
}: CompilerArgs<Select>): string => {
    const distinct_string = statement.distinct ? 'DISTINCT ' : ''

    const select_strings = statement.select.map(({ expression, as }) => {
        const expression_string = compile_expression({
            statement: expression,
            dialect,
            params,
        })
        return as === undefined
            ? expression_string
            : `${expression_string} AS ${escape_identifier(dialect, as)}`
    })

    const join_strings = (statement.joins ?? []).map(
        join =>
            ` ${
                join.type === 'left' ? 'LEFT JOIN' : 'INNER JOIN'
            } ${compile_table_reference(join, dialect)} ON ${compile_where({
                statement: join.on,
                dialect,
                params,
            })}`
    )

    const where_string = statement.where
        ? ` WHERE ${compile_where({
              statement: statement.where,
              dialect,
              params,
          })}`
        : ''

    const order_by_string =
        statement.order_by && statement.order_by.length > 0
            ? ` ORDER BY ${statement.order_by
                  .map(
                      ({ expression, direction }) =>
                          `${compile_expression({
                              statement: expression,
                              dialect,
                              params,
                          })} ${direction === 'asc' ? 'ASC' : 'DESC'}`
                  )
                  .join(', ')}`
            : ''

    const limit_string =
        statement.limit !== undefined
            ? ` LIMIT ${params.add(statement.limit)}`
            : statement.offset !== undefined
            ? ` LIMIT ${unbounded_limits[dialect]}`
            : ''

    const offset_string =
        statement.offset !== undefined
            ? ` OFFSET ${params.add(statement.offset)}`
            : ''

    return `SELECT ${distinct_string}${select_strings.join(
        ', '
    )} FROM ${compile_table_reference(
        statement.from,
        dialect,
    )}${join_strings.join('')}${where_string}${order_by_string}${limit_string}${offset_string}`
}
