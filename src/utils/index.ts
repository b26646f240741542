/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 */

export { logger, configureLogger } from './logger';
export type { ScopedLogger, LogLevel, LevelOption, ConfigureLoggerOptions } from './logger';

export * from './fileHelpers';
export * from './format';
export * from './remotePath';

export * as schemas from './schemas';
export { validate, validateEndpoint, validateTransferRequest } from './schemas';
export type { ZodValidationResult } from './schemas';
