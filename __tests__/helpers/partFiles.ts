/**
 * Inspección de los temporales de segmento que quedan en disco tras un test.
 */
import { promises as fs } from 'fs';
import type SegmentStore from '../../src/engines/SegmentStore';

/** Pares [índice, tamaño] de los temporales existentes; los ausentes se omiten. */
export async function existingParts(
  store: SegmentStore,
  finalPath: string,
  indices: number[]
): Promise<[number, number][]> {
  const found: [number, number][] = [];
  for (const index of indices) {
    const stats = await fs.stat(store.getPartPath(finalPath, index)).catch(() => null);
    if (stats) found.push([index, stats.size]);
  }
  return found;
}
