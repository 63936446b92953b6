type ErrorCode =
    | 'configuration_error'
    | 'unknown_relation'
    | 'query_execution_error'
    | 'no_match'
    | 'multiple_matches'
    | 'persistence_error'
    | 'hydration_error'
    | 'validation_error'
    | 'cancelled'

export type TesseraErrorInfo = {
    model?: string
    path?: (string | number)[]
    recommendation?: string
    additional_info?: Record<string, unknown>
    cause?: unknown
}

/**
 * Base class for every error thrown by tessera. Carries enough context (model name, relation or field
 * path) to find what went wrong without reading a stack trace.
 */
export class TesseraError extends Error {
    readonly error_code: ErrorCode
    readonly model?: string
    readonly path?: (string | number)[]
    readonly recommendation?: string
    readonly additional_info?: Record<string, unknown>

    constructor(
        error_code: ErrorCode,
        message: string,
        info: TesseraErrorInfo = {}
    ) {
        super(message, { cause: info.cause })
        this.name = new.target.name
        this.error_code = error_code
        this.model = info.model
        this.path = info.path
        this.recommendation = info.recommendation
        this.additional_info = info.additional_info
    }
}

/**
 * Invalid model or relation declarations, or an invalid query shape. Never retried.
 */
export class ConfigurationError extends TesseraError {
    constructor(message: string, info: TesseraErrorInfo = {}) {
        super('configuration_error', message, info)
    }
}

export class UnknownRelationError extends TesseraError {
    readonly segment: string

    constructor(model: string, segment: string, path: string[]) {
        super(
            'unknown_relation',
            `Model ${model} has no relation named ${segment} (in path ${path.join('.')}).`,
            { model, path }
        )
        this.segment = segment
    }
}

export class QueryExecutionError extends TesseraError {
    constructor(
        message: string,
        info: TesseraErrorInfo = {},
        error_code: ErrorCode = 'query_execution_error'
    ) {
        super(error_code, message, info)
    }
}

export class NoMatchError extends QueryExecutionError {
    constructor(model: string) {
        super(`No ${model} matched the query.`, { model }, 'no_match')
    }
}

export class MultipleMatchesError extends QueryExecutionError {
    constructor(model: string) {
        super(
            `More than one ${model} matched the query.`,
            {
                model,
                recommendation:
                    'Narrow the filter or use first() instead of get().',
            },
            'multiple_matches'
        )
    }
}

export class PersistenceError extends TesseraError {
    /**
     * True when the write already went through and only an after hook failed
     */
    readonly committed: boolean

    constructor(
        message: string,
        info: TesseraErrorInfo & { committed?: boolean } = {}
    ) {
        super('persistence_error', message, info)
        this.committed = info.committed ?? false
    }
}

export class HydrationError extends TesseraError {
    constructor(message: string, info: TesseraErrorInfo = {}) {
        super('hydration_error', message, info)
    }
}

export type FieldError = {
    field: string
    message: string
}

export class ValidationError extends TesseraError {
    readonly errors: FieldError[]

    constructor(model: string, errors: FieldError[]) {
        super(
            'validation_error',
            `Invalid ${model}: ${errors
                .map(({ field, message }) =>
                    field ? `${field} ${message}` : message
                )
                .join('; ')}`,
            { model }
        )
        this.errors = errors
    }
}

export class CancellationError extends TesseraError {
    constructor(reason: unknown) {
        super('cancelled', 'The operation was cancelled.', { cause: reason })
    }
}

/**
 * Throws a single ConfigurationError listing every message, if there are any
 */
export const throw_configuration_errors = (
    messages: string[],
    info: TesseraErrorInfo = {}
) => {
    if (messages.length > 0) {
        throw new ConfigurationError(messages.join('\n'), info)
    }
}

export const throw_if_aborted = (signal: AbortSignal | undefined) => {
    if (signal?.aborted) {
        throw new CancellationError(signal.reason)
    }
}
