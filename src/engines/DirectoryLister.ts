/**
 * Listado de directorios remotos tolerante a servidores sin MLSD.
 *
 * Prefiere el listado estructurado (facts type/size/modify). Si el servidor
 * rechaza el sondeo OPTS MLST, usa NLST y clasifica cada nombre intentando
 * entrar en él: CWD correcto → directorio, rechazo del servidor → archivo.
 * El listado completo se reintenta con la política compartida.
 *
 * @module engines/DirectoryLister
 */

import { FTPError } from 'basic-ftp';
import config from '../config';
import type { AppConfig } from '../configTypes';
import type { DirectoryEntry, EntryKind } from '../../shared/types';
import { LISTING_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { ProtocolError } from './errors';
import { runWithRetry, type RetryInfo } from './RetryPolicy';
import type { FtpSession } from './types';

const log = logger.child('DirectoryLister');

const SIZE_PATTERN = /^\d+$/;

/**
 * Parsea una línea MLSD ("type=file;size=10;modify=20240101120000; nombre").
 * Devuelve null para las entradas cdir/pdir (el propio directorio y su padre).
 */
export function parseStructuredLine(line: string): DirectoryEntry | null {
  const separator = line.indexOf(' ');
  if (separator < 0) return null;
  const factsPart = line.slice(0, separator);
  const name = line.slice(separator + 1);
  if (!name) return null;

  const facts = new Map<string, string>();
  for (const fact of factsPart.split(';')) {
    const eq = fact.indexOf('=');
    if (eq <= 0) continue;
    facts.set(fact.slice(0, eq).toLowerCase(), fact.slice(eq + 1));
  }

  const type = (facts.get('type') ?? 'file').toLowerCase();
  if (type === 'cdir' || type === 'pdir') return null;
  const kind: EntryKind = type === 'dir' ? 'dir' : 'file';

  const rawSize = facts.get('size');
  const size = rawSize !== undefined && SIZE_PATTERN.test(rawSize) ? Number(rawSize) : null;

  return {
    name,
    kind,
    size,
    modifiedTimestamp: facts.get('modify') ?? null,
  };
}

/** Directorios primero; dentro de cada grupo, por nombre sin distinguir mayúsculas. */
export function compareEntries(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.kind !== b.kind) return a.kind === 'dir' ? -1 : 1;
  const an = a.name.toLowerCase();
  const bn = b.name.toLowerCase();
  if (an < bn) return -1;
  if (an > bn) return 1;
  return 0;
}

export function sortEntries(entries: DirectoryEntry[]): DirectoryEntry[] {
  return [...entries].sort(compareEntries);
}

export interface DirectoryListerDeps {
  config?: AppConfig;
  sleep?: (_ms: number) => Promise<void>;
  onRetry?: (_info: RetryInfo) => void;
}

export class DirectoryLister {
  private readonly config: AppConfig;
  private readonly sleep: ((_ms: number) => Promise<void>) | undefined;
  private readonly onRetry: ((_info: RetryInfo) => void) | undefined;

  constructor(deps: DirectoryListerDeps = {}) {
    this.config = deps.config ?? config;
    this.sleep = deps.sleep;
    this.onRetry = deps.onRetry;
  }

  /**
   * Lista `path` y deja la sesión posicionada en él.
   *
   * @throws ProtocolError tras agotar listing.listRetries intentos.
   */
  list(session: FtpSession, path: string): Promise<DirectoryEntry[]> {
    const { listRetries, listRetryDelayMs } = this.config.listing;
    return runWithRetry(() => this.listOnce(session, path), {
      attempts: listRetries,
      baseDelayMs: listRetryDelayMs,
      label: `Listado de ${path}`,
      sleep: this.sleep,
      onRetry: this.onRetry,
      toError: (error, attempts) =>
        new ProtocolError(`${LISTING_ERRORS.LIST_FAILED} ${path}`, { attempts, cause: error }),
    });
  }

  private async listOnce(session: FtpSession, path: string): Promise<DirectoryEntry[]> {
    await session.cd(path);
    const structured = await session.probeStructuredListing();
    const entries = structured
      ? await this.listStructured(session)
      : await this.listByProbing(session);
    log.debug(
      `${path}: ${entries.length} entradas (${structured ? 'MLSD' : 'NLST + sondeo CWD'})`
    );
    return sortEntries(entries);
  }

  private async listStructured(session: FtpSession): Promise<DirectoryEntry[]> {
    const lines = await session.listStructured();
    const entries: DirectoryEntry[] = [];
    for (const line of lines) {
      const entry = parseStructuredLine(line);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  private async listByProbing(session: FtpSession): Promise<DirectoryEntry[]> {
    const names = await session.listNames();
    const entries: DirectoryEntry[] = [];
    for (const name of names) {
      const kind = await this.classify(session, name);
      const size = kind === 'dir' ? null : await this.trySize(session, name);
      entries.push({ name, kind, size, modifiedTimestamp: null });
    }
    return entries;
  }

  /** CWD name + CWD .. ; si la sesión murió durante el sondeo, el error se propaga. */
  private async classify(session: FtpSession, name: string): Promise<EntryKind> {
    try {
      await session.cd(name);
    } catch (error) {
      if (error instanceof FTPError || !session.closed) return 'file';
      throw error;
    }
    await session.cd('..');
    return 'dir';
  }

  private async trySize(session: FtpSession, name: string): Promise<number | null> {
    try {
      return await session.size(name);
    } catch (error) {
      if (error instanceof FTPError || !session.closed) return null;
      throw error;
    }
  }
}

const directoryLister = new DirectoryLister();
export default directoryLister;
