import pino, { type Logger } from 'pino'
import { TesseraConfig } from '../config/config'

export type { Logger }

export const create_logger = (
    config: Pick<TesseraConfig, 'log_level' | 'logger_name'>
): Logger =>
    pino({
        name: config.logger_name,
        level: config.log_level,
    })
