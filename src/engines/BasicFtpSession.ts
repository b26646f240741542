/**
 * FtpSession sobre un Client de basic-ftp ya autenticado.
 *
 * Los comandos de control usan la API del Client. Las transferencias de datos
 * (MLSD, NLST, RETR) se gestionan con una tarea propia sobre el FTPContext para
 * soportar modo activo y la parada por cuota: al llenarse la cuota del sink se
 * destruye el socket de datos, la tarea se resuelve como 'quota' y la sesión se
 * cierra (la respuesta 426/226 que llegue después ya no tiene a quién confundir).
 *
 * @module engines/BasicFtpSession
 */

import { Writable, pipeline } from 'stream';
import type { Socket } from 'net';
import { FTPError, type Client, type FTPContext, type FTPResponse, type TaskResolver } from 'basic-ftp';
import type { ServerEndpoint } from '../../shared/types';
import { CONNECTION_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { ActiveDataChannel } from './DataChannel';
import type { QuotaWriter } from './QuotaWriter';
import type { FtpSession, RetrieveOutcome } from './types';

const log = logger.child('FtpSession');

export interface BasicFtpSessionOptions {
  endpoint: ServerEndpoint;
  passiveMode: boolean;
  activeModeAcceptTimeoutMs: number;
  /** Etiqueta para logs (host:puerto). */
  label: string;
}

/** Acumula un listado en memoria. */
class TextCollector extends Writable {
  private readonly chunks: Buffer[] = [];

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: () => void): void {
    this.chunks.push(chunk);
    callback();
  }

  lines(encoding: BufferEncoding): string[] {
    return Buffer.concat(this.chunks)
      .toString(encoding)
      .split(/\r?\n/)
      .map(line => line.replace(/\r$/, ''))
      .filter(line => line.trim().length > 0);
  }
}

function isPositiveCompletion(code: number): boolean {
  return code >= 200 && code < 300;
}

export class BasicFtpSession implements FtpSession {
  private readonly client: Client;
  private readonly options: BasicFtpSessionOptions;

  constructor(client: Client, options: BasicFtpSessionOptions) {
    this.client = client;
    this.options = options;
  }

  get endpoint(): ServerEndpoint {
    return this.options.endpoint;
  }

  get closed(): boolean {
    return this.client.closed;
  }

  pwd(): Promise<string> {
    return this.client.pwd();
  }

  async cd(path: string): Promise<void> {
    await this.client.cd(path);
  }

  size(path: string): Promise<number> {
    return this.client.size(path);
  }

  async probeStructuredListing(): Promise<boolean> {
    try {
      await this.client.send('OPTS MLST type;size;modify;');
      return true;
    } catch (error) {
      if (error instanceof FTPError) {
        log.debug(`${this.options.label}: MLST no soportado (${error.code})`);
        return false;
      }
      throw error;
    }
  }

  async listStructured(): Promise<string[]> {
    const collector = new TextCollector();
    await this.transfer('MLSD', collector);
    return collector.lines('utf8');
  }

  async listNames(): Promise<string[]> {
    const collector = new TextCollector();
    await this.transfer('NLST', collector);
    return collector.lines('utf8');
  }

  async retrieve(remotePath: string, offset: number, sink: QuotaWriter): Promise<RetrieveOutcome> {
    const validPath = await this.protectLeadingSpace(remotePath);
    return this.transfer(`RETR ${validPath}`, sink, offset);
  }

  /** Una ruta relativa que empieza por espacio se envía absoluta para que el servidor no lo recorte. */
  private async protectLeadingSpace(path: string): Promise<string> {
    if (!path.startsWith(' ')) return path;
    const cwd = await this.client.pwd();
    return `${cwd.endsWith('/') ? cwd : `${cwd}/`}${path}`;
  }

  close(): void {
    if (!this.client.closed) {
      log.debug(`${this.options.label}: cerrando sesión`);
    }
    this.client.close();
  }

  /**
   * Abre el canal de datos (PASV/EPSV o PORT), envía REST si offset > 0 y ejecuta
   * el comando volcando los datos en sink.
   */
  private async transfer(
    command: string,
    sink: Writable,
    offset = 0
  ): Promise<RetrieveOutcome> {
    const ftp = this.client.ftp;
    let active: ActiveDataChannel | null = null;
    try {
      if (this.options.passiveMode) {
        await this.client.prepareTransfer(ftp);
      } else {
        active = await ActiveDataChannel.open(ftp, this.options.activeModeAcceptTimeoutMs);
        await this.client.send(active.command);
      }
      if (offset > 0) {
        await this.client.send(`REST ${offset}`);
      }
      const outcome = await this.runDataTask(ftp, command, sink, active);
      if (outcome === 'quota') {
        this.client.close();
      }
      return outcome;
    } finally {
      active?.close();
    }
  }

  private runDataTask(
    ftp: FTPContext,
    command: string,
    sink: Writable,
    active: ActiveDataChannel | null
  ): Promise<RetrieveOutcome> {
    let outcome: RetrieveOutcome = 'complete';
    let settled = false;
    let dataDone = false;
    let controlResponse: FTPResponse | null = null;

    const finish = (task: TaskResolver, response: FTPResponse | null): void => {
      if (settled) return;
      settled = true;
      ftp.socket.setTimeout(ftp.timeout);
      ftp.dataSocket = undefined;
      task.resolve(response);
    };

    const fail = (task: TaskResolver, error: Error): void => {
      if (settled) return;
      settled = true;
      ftp.socket.setTimeout(ftp.timeout);
      ftp.dataSocket = undefined;
      task.reject(error);
    };

    const startData = (task: TaskResolver, socket: Socket): void => {
      if (settled) {
        socket.destroy();
        return;
      }
      if (ftp.dataSocket !== socket) {
        ftp.dataSocket = socket;
      }
      ftp.socket.setTimeout(0);
      socket.setTimeout(ftp.timeout);
      sink.once('quota', () => {
        outcome = 'quota';
        log.debug(`${this.options.label}: cuota alcanzada, cortando conexión de datos`);
        finish(task, null);
      });
      pipeline(socket, sink, error => {
        if (settled) return;
        if (error) {
          fail(task, error);
          return;
        }
        dataDone = true;
        ftp.socket.setTimeout(ftp.timeout);
        if (controlResponse) finish(task, controlResponse);
      });
    };

    const handle = ftp.handle(command, (res, task) => {
      if (res instanceof Error) {
        fail(task, res);
      } else if (res.code === 150 || res.code === 125) {
        if (active) {
          void active.accept().then(
            socket => startData(task, socket),
            (error: Error) => fail(task, error)
          );
        } else if (ftp.dataSocket) {
          startData(task, ftp.dataSocket);
        } else {
          fail(task, new Error(CONNECTION_ERRORS.NO_DATA_CONNECTION));
        }
      } else if (isPositiveCompletion(res.code)) {
        controlResponse = res;
        if (dataDone) finish(task, res);
      }
    });

    return handle.then(() => outcome);
  }
}
