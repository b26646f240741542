/**
 * @fileoverview Utilidades para operaciones con archivos locales (tamaño, directorios, borrado).
 * @module fileHelpers
 */

import { promises as fs } from 'fs';
import path from 'path';
import { FILE_ERRORS } from '../constants/errors';
import { logger } from './logger';

const log = logger.child('FileUtils');

/**
 * Código errno de un error del sistema ('ENOENT', 'ENOSPC'...).
 * Comprobación estructural: los errores de fs pueden venir de otro contexto JS
 * y no pasar `instanceof Error`.
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isNotFound(error: unknown): boolean {
  return getErrnoCode(error) === 'ENOENT';
}

/**
 * Tamaño actual en disco; 0 si el archivo no existe.
 * Se lee siempre del disco: es la fuente de verdad del offset de reanudación.
 */
export async function getLocalFileSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size;
  } catch (error) {
    if (isNotFound(error)) return 0;
    throw error;
  }
}

/** Crea el directorio padre de filePath si no existe. */
export async function ensureParentDirectory(filePath: string): Promise<void> {
  const dir = path.dirname(filePath);
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    log.error(`${FILE_ERRORS.CREATE_DIRECTORY_FAILED}: ${dir}`, error);
    throw new Error(`${FILE_ERRORS.CREATE_DIRECTORY_FAILED}: ${dir}`, { cause: error });
  }
}

/** Borra un archivo; no falla si ya no existe. Devuelve true si se borró. */
export async function removeFileIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    log.error('Error eliminando archivo:', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
