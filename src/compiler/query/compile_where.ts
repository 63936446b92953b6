import { CompilerArgs } from '../compiler'
import {
    compile_expression,
    Expression,
} from '../expression/compile_expression'
import { compile_select, Select } from './compile_select'

type Comparison = readonly [Expression, Expression]

export type Where =
    | { readonly eq: Comparison }
    | { readonly ne: Comparison }
    | { readonly gt: Comparison }
    | { readonly gte: Comparison }
    | { readonly lt: Comparison }
    | { readonly lte: Comparison }
    | {
          readonly like: Comparison
          /**
           * Escape character used in the pattern
           */
          readonly escape?: string
      }
    | { readonly in: readonly [Expression, readonly Expression[] | Select] }
    | { readonly is_null: Expression }
    | { readonly is_not_null: Expression }
    | { readonly not: Where }
    | { readonly and: readonly Where[] }
    | { readonly or: readonly Where[] }
    | { readonly never: true }

const comparison_operators = {
    eq: '=',
    ne: '<>',
    gt: '>',
    gte: '>=',
    lt: '<',
    lte: '<=',
} as const

const compile_comparison = (
    [left, right]: Comparison,
    operator: string,
    { dialect, params }: Omit<CompilerArgs<unknown>, 'statement'>
) =>
    `${compile_expression({
        statement: left,
        dialect,
        params,
    })} ${operator} ${compile_expression({ statement: right, dialect, params })}`

export const compile_where = ({
    statement,
    dialect,
    params,
}: CompilerArgs<Where>): string => {
    const context = { dialect, params }

    if ('eq' in statement) {
        return compile_comparison(statement.eq, comparison_operators.eq, context)
    }
    if ('ne' in statement) {
        return compile_comparison(statement.ne, comparison_operators.ne, context)
    }
    if ('gt' in statement) {
        return compile_comparison(statement.gt, comparison_operators.gt, context)
    }
    if ('gte' in statement) {
        return compile_comparison(
            statement.gte,
            comparison_operators.gte,
            context
        )
    }
    if ('lt' in statement) {
        return compile_comparison(statement.lt, comparison_operators.lt, context)
    }
    if ('lte' in statement) {
        return compile_comparison(
            statement.lte,
            comparison_operators.lte,
            context
        )
    }

    if ('like' in statement) {
        const like_string = compile_comparison(statement.like, 'LIKE', context)
        return statement.escape === undefined
            ? like_string
            : `${like_string} ESCAPE '${statement.escape}'`
    }

    if ('in' in statement) {
        const [left, right] = statement.in
        const left_string = compile_expression({
            statement: left,
            dialect,
            params,
        })

        if ('select' in right) {
            return `${left_string} IN (${compile_select({
                statement: right,
                dialect,
                params,
            })})`
        }

        // IN () is a syntax error in most databases
        if (right.length === 0) {
            return '1 = 0'
        }

        return `${left_string} IN (${right
            .map(el => compile_expression({ statement: el, dialect, params }))
            .join(', ')})`
    }

    if ('is_null' in statement) {
        return `${compile_expression({
            statement: statement.is_null,
            dialect,
            params,
        })} IS NULL`
    }

    if ('is_not_null' in statement) {
        return `${compile_expression({
            statement: statement.is_not_null,
            dialect,
            params,
        })} IS NOT NULL`
    }

    if ('not' in statement) {
        return `NOT (${compile_where({
            statement: statement.not,
            dialect,
            params,
        })})`
    }

    if ('and' in statement) {
        return statement.and.length === 0
            ? '1 = 1'
            : statement.and
                  .map(
                      el =>
                          `(${compile_where({ statement: el, dialect, params })})`
                  )
                  .join(' AND ')
    }

    if ('or' in statement) {
        return statement.or.length === 0
            ? '1 = 0'
            : statement.or
                  .map(
                      el =>
                          `(${compile_where({ statement: el, dialect, params })})`
                  )
                  .join(' OR ')
    }

    return '1 = 0'
}
