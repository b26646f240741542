/**
 * Rutas de los archivos temporales de una descarga segmentada.
 *
 * Cada segmento escribe en `<destino>.part<índice>` y el merge usa
 * `<destino>.staging` antes del rename final. Los nombres son deterministas
 * para que un fallo deje los temporales localizables junto al destino.
 *
 * @module SegmentStore
 */

import { logger } from '../utils';
import { removeFileIfExists } from '../utils/fileHelpers';
import { describeCause } from './errors';

const log = logger.child('SegmentStore');

export default class SegmentStore {
  getPartPath(finalPath: string, index: number): string {
    return `${finalPath}.part${index}`;
  }

  getStagingPath(finalPath: string): string {
    return `${finalPath}.staging`;
  }

  /** Borra los temporales indicados; devuelve cuántos existían. */
  async deleteParts(finalPath: string, indices: number[]): Promise<number> {
    let deleted = 0;
    for (const index of indices) {
      const partPath = this.getPartPath(finalPath, index);
      try {
        if (await removeFileIfExists(partPath)) deleted++;
      } catch (error) {
        log.warn(`Error eliminando temporal ${partPath}: ${describeCause(error)}`);
      }
    }
    return deleted;
  }
}
