import { validate } from 'jsonschema'
import { throw_configuration_errors } from '../helpers/error_handling'
import { is_one_of } from '../helpers/helpers'

export const log_levels = [
    'fatal',
    'error',
    'warn',
    'info',
    'debug',
    'trace',
    'silent',
] as const

export type LogLevel = (typeof log_levels)[number]

export type TesseraConfig = {
    readonly log_level: LogLevel
    readonly logger_name: string
    /**
     * Send independent prefetch statements to the driver in one batch instead of one at a time
     */
    readonly concurrent_prefetch: boolean
    /**
     * Reject limit / offset without an order_by instead of only logging a warning
     */
    readonly strict_pagination: boolean
}

export const default_config: TesseraConfig = {
    log_level: 'info',
    logger_name: 'tessera',
    concurrent_prefetch: true,
    strict_pagination: false,
}

export const config_schema = {
    type: 'object',
    properties: {
        log_level: { type: 'string', enum: [...log_levels] },
        logger_name: { type: 'string', minLength: 1 },
        concurrent_prefetch: { type: 'boolean' },
        strict_pagination: { type: 'boolean' },
    },
    additionalProperties: false,
}

const env_variables = {
    log_level: 'TESSERA_LOG_LEVEL',
    logger_name: 'TESSERA_LOGGER_NAME',
    concurrent_prefetch: 'TESSERA_CONCURRENT_PREFETCH',
    strict_pagination: 'TESSERA_STRICT_PAGINATION',
} as const

const parse_env_boolean = (value: string) => {
    const normalized = value.trim().toLowerCase()
    if (['true', '1', 'yes'].includes(normalized)) {
        return true
    }
    if (['false', '0', 'no'].includes(normalized)) {
        return false
    }

    // left as a string so schema validation reports it
    return value
}

const get_env_config = (env: NodeJS.ProcessEnv) => {
    const env_config: Record<string, unknown> = {}
    const { log_level, logger_name, concurrent_prefetch, strict_pagination } =
        env_variables

    if (env[log_level] !== undefined) {
        env_config.log_level = env[log_level]
    }
    if (env[logger_name] !== undefined) {
        env_config.logger_name = env[logger_name]
    }
    const concurrent_prefetch_value = env[concurrent_prefetch]
    if (concurrent_prefetch_value !== undefined) {
        env_config.concurrent_prefetch = parse_env_boolean(
            concurrent_prefetch_value
        )
    }
    const strict_pagination_value = env[strict_pagination]
    if (strict_pagination_value !== undefined) {
        env_config.strict_pagination = parse_env_boolean(
            strict_pagination_value
        )
    }

    return env_config
}

/**
 * Merges defaults, TESSERA_* environment variables and explicit overrides (in increasing priority) and
 * validates the result
 */
export const load_config = (
    overrides: Partial<TesseraConfig> = {},
    env: NodeJS.ProcessEnv = process.env
): TesseraConfig => {
    const candidate: Record<string, unknown> = {
        ...default_config,
        ...get_env_config(env),
        ...overrides,
    }

    const { errors } = validate(candidate, config_schema)
    throw_configuration_errors(
        errors.map(error => `Invalid config: ${error.stack}`)
    )

    const { log_level, logger_name, concurrent_prefetch, strict_pagination } =
        candidate

    return {
        log_level: is_one_of(log_levels, log_level)
            ? log_level
            : default_config.log_level,
        logger_name:
            typeof logger_name === 'string'
                ? logger_name
                : default_config.logger_name,
        concurrent_prefetch:
            typeof concurrent_prefetch === 'boolean'
                ? concurrent_prefetch
                : default_config.concurrent_prefetch,
        strict_pagination:
            typeof strict_pagination === 'boolean'
                ? strict_pagination
                : default_config.strict_pagination,
    }
}
