/**
 * @fileoverview Rutas remotas FTP (siempre con '/', independientes del sistema local).
 * @module utils/remotePath
 */

import path from 'path';

/** Une un directorio remoto y un nombre: ('/', 'a') → '/a', ('/pub', 'a') → '/pub/a'. */
export function joinRemotePath(dir: string, name: string): string {
  if (dir.endsWith('/')) return `${dir}${name}`;
  return `${dir}/${name}`;
}

/** Directorio padre; la raíz es su propio padre. */
export function parentRemotePath(dir: string): string {
  if (dir === '/') return '/';
  const trimmed = dir.replace(/\/+$/, '');
  return path.posix.dirname(trimmed) || '/';
}

/** Último componente de una ruta remota ('/pub/a.bin' → 'a.bin'). */
export function remoteBasename(remotePath: string): string {
  return path.posix.basename(remotePath);
}
