/**
 * Fusión de los temporales de segmento en el archivo final (staging + rename).
 *
 * assemble: concatena las partes en orden ascendente de índice en `<destino>.staging`,
 * verifica que el tamaño coincide con el esperado, renombra al destino y borra las
 * partes. Si algo falla se borra el staging y las partes quedan intactas.
 *
 * @module FileAssembler
 */

import { promises as fs } from 'fs';
import path from 'path';
import config from '../config';
import { FILE_ERRORS, SEGMENT_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { getErrnoCode } from '../utils/fileHelpers';
import { describeCause } from './errors';
import type SegmentStore from './SegmentStore';

const log = logger.child('FileAssembler');

export interface PartToAssemble {
  index: number;
  path: string;
}

export interface AssembleResult {
  finalPath: string;
  bytesProcessed: number;
  duration: number;
  partsDeleted: number;
}

export interface FileAssemblerOptions {
  /** Tamaño del buffer de copia. */
  bufferSize?: number;
  /** Borrar las partes tras el rename. */
  cleanup?: boolean;
}

export default class FileAssembler {
  private readonly segmentStore: SegmentStore;
  private readonly bufferSize: number;
  private readonly cleanup: boolean;

  constructor(segmentStore: SegmentStore, options: FileAssemblerOptions = {}) {
    this.segmentStore = segmentStore;
    this.bufferSize = options.bufferSize ?? config.transfer.blockSize;
    this.cleanup = options.cleanup ?? config.transfer.cleanupOnComplete;
  }

  /**
   * Concatena las partes en orden en un archivo staging y lo renombra a finalPath.
   *
   * @throws Error si falta una parte o el tamaño final no es expectedSize.
   */
  async assemble(
    parts: PartToAssemble[],
    finalPath: string,
    expectedSize: number
  ): Promise<AssembleResult> {
    const stagingPath = this.segmentStore.getStagingPath(finalPath);
    const sortedParts = [...parts].sort((a, b) => a.index - b.index);
    const startTime = Date.now();
    let bytesProcessed = 0;

    for (const part of sortedParts) {
      try {
        await fs.access(part.path);
      } catch {
        throw new Error(`${SEGMENT_ERRORS.MISSING_PART} ${part.index}: ${part.path}`);
      }
    }

    await fs.mkdir(path.dirname(finalPath), { recursive: true });
    const staging = await fs.open(stagingPath, 'w');
    try {
      const buffer = Buffer.allocUnsafe(this.bufferSize);
      for (const part of sortedParts) {
        const handle = await fs.open(part.path, 'r');
        try {
          let position = 0;
          for (;;) {
            const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
            if (bytesRead === 0) break;
            await staging.write(buffer, 0, bytesRead, bytesProcessed);
            position += bytesRead;
            bytesProcessed += bytesRead;
          }
        } finally {
          await handle.close();
        }
      }
    } catch (error) {
      await staging.close();
      await this.cleanStagingFile(finalPath);
      throw this.describeFsError(error, finalPath);
    }
    await staging.close();

    const stagingStats = await fs.stat(stagingPath);
    if (stagingStats.size !== expectedSize) {
      await this.cleanStagingFile(finalPath);
      throw new Error(
        `${SEGMENT_ERRORS.MERGE_SIZE_MISMATCH}: ${stagingStats.size}/${expectedSize} bytes`
      );
    }

    await fs.rename(stagingPath, finalPath);
    log.info(`Archivo final creado: ${finalPath}`);

    let partsDeleted = 0;
    if (this.cleanup) {
      partsDeleted = await this.segmentStore.deleteParts(
        finalPath,
        sortedParts.map(p => p.index)
      );
      log.info(`Ensamblaje completado: ${partsDeleted}/${sortedParts.length} temporales eliminados`);
    }

    return {
      finalPath,
      bytesProcessed,
      duration: (Date.now() - startTime) / 1000,
      partsDeleted,
    };
  }

  async cleanStagingFile(finalPath: string): Promise<void> {
    try {
      await fs.unlink(this.segmentStore.getStagingPath(finalPath));
    } catch (error) {
      if (getErrnoCode(error) !== 'ENOENT') {
        log.warn(`Error limpiando staging de ${finalPath}: ${describeCause(error)}`);
      }
    }
  }

  private describeFsError(error: unknown, finalPath: string): Error {
    const code = getErrnoCode(error);
    if (code === 'ENOSPC') {
      return new Error('Disco lleno: No hay espacio suficiente para el archivo final', {
        cause: error,
      });
    }
    if (code === 'EACCES' || code === 'EPERM') {
      return new Error(`${FILE_ERRORS.WRITE_FAILED}: sin permisos en ${path.dirname(finalPath)}`, {
        cause: error,
      });
    }
    log.error('Error en ensamblaje:', error);
    return error instanceof Error ? error : new Error(describeCause(error), { cause: error });
  }
}
