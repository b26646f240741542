/**
 * @fileoverview Logging del motor sobre electron-log (entrada para Node).
 * @module utils/logger
 *
 * Cada módulo pide su logger con `logger.child('Scope')`; los scopes anidados
 * se escriben como `Padre:Hijo`. `configureLogger` fija niveles y formato de
 * los transports de archivo y consola.
 */

import log from 'electron-log/node';
import config from '../config';
import type { LogLevelName } from '../configTypes';

export type LogLevel = LogLevelName;

/** Nivel de un transport; false lo desactiva. */
export type LevelOption = LogLevel | false;

export interface ConfigureLoggerOptions {
  fileLevel?: LevelOption;
  consoleLevel?: LevelOption;
  maxSize?: number;
  /** Sobrescribe la ruta del archivo de log. */
  filePath?: string;
}

type LogFn = (..._args: unknown[]) => void;

export interface ScopedLogger {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  /** Registra el inicio; la función devuelta registra el fin con la duración. */
  startOperation: (_operation: string) => (_result?: string) => void;
  child: (_subScope: string) => ScopedLogger;
}

/** Los Error se escriben con su stack; el resto pasa tal cual a electron-log. */
function expandErrors(args: unknown[]): unknown[] {
  return args.map(arg => (arg instanceof Error ? `${arg.message}\n${arg.stack ?? ''}` : arg));
}

const scopedLoggers = new Map<string, ScopedLogger>();

function scoped(scope: string): ScopedLogger {
  const cached = scopedLoggers.get(scope);
  if (cached) return cached;

  const target = log.scope(scope);
  const at =
    (level: 'error' | 'warn' | 'info' | 'debug'): LogFn =>
    (...args) =>
      target[level](...expandErrors(args));

  const created: ScopedLogger = {
    error: at('error'),
    warn: at('warn'),
    info: at('info'),
    debug: at('debug'),
    startOperation(operation) {
      const start = Date.now();
      target.info(`▶ ${operation}`);
      return (result = 'completado') => target.info(`✓ ${operation}: ${result} (${Date.now() - start}ms)`);
    },
    child: subScope => scoped(`${scope}:${subScope}`),
  };
  scopedLoggers.set(scope, created);
  return created;
}

/**
 * Configura los transports de archivo y consola.
 * Los valores omitidos salen de config.logging; con NODE_ENV=production la
 * consola queda en 'warn' salvo que se indique otro nivel.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): void {
  const {
    fileLevel = config.logging.fileLevel,
    consoleLevel = process.env.NODE_ENV === 'production' ? 'warn' : config.logging.consoleLevel,
    maxSize = config.logging.maxSize,
    filePath,
  } = options;

  log.transports.file.level = fileLevel;
  log.transports.file.maxSize = maxSize;
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';
  if (filePath) {
    log.transports.file.resolvePathFn = () => filePath;
  }

  log.transports.console.level = consoleLevel;
  log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

  if (fileLevel !== false) {
    log.info(`Logger inicializado (archivo: ${log.transports.file.getFile()?.path ?? 'no disponible'})`);
  }
}

/** Raíz de los loggers del motor. */
export const logger = {
  child: scoped,
};
