/**
 * Canal de datos en modo activo (PORT/EPRT).
 *
 * El cliente escucha en la dirección local de la conexión de control y el
 * servidor se conecta tras el comando de transferencia. Si la conexión de
 * control usa TLS, el socket aceptado se envuelve como cliente TLS reutilizando
 * la sesión del control.
 *
 * @module engines/DataChannel
 */

import net, { type Server, type Socket } from 'net';
import tls, { TLSSocket } from 'tls';
import type { FTPContext } from 'basic-ftp';
import { CONNECTION_ERRORS } from '../constants/errors';
import { logger } from '../utils';

const log = logger.child('DataChannel');

/** Dirección IPv4 sin el prefijo de IPv4 mapeada en IPv6. */
function normalizeAddress(address: string): string {
  return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

/** PORT h1,h2,h3,h4,p1,p2 para IPv4; EPRT |2|addr|port| para IPv6. */
export function buildPortCommand(address: string, port: number): string {
  const host = normalizeAddress(address);
  if (net.isIPv4(host)) {
    return `PORT ${host.split('.').join(',')},${Math.floor(port / 256)},${port % 256}`;
  }
  return `EPRT |2|${host}|${port}|`;
}

export class ActiveDataChannel {
  private readonly server: Server;
  private readonly ftp: FTPContext;
  private readonly acceptTimeoutMs: number;
  private accepted: Socket | null = null;
  private failure: Error | null = null;
  private waiter: { resolve: (_s: Socket) => void; reject: (_e: Error) => void } | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private _closed = false;

  private constructor(server: Server, ftp: FTPContext, acceptTimeoutMs: number) {
    this.server = server;
    this.ftp = ftp;
    this.acceptTimeoutMs = acceptTimeoutMs;
    server.on('connection', socket => this.onConnection(socket));
    server.on('error', error => this.fail(error));
  }

  /** Abre un listener en la dirección local del control. */
  static async open(ftp: FTPContext, acceptTimeoutMs: number): Promise<ActiveDataChannel> {
    const localAddress = normalizeAddress(ftp.socket.localAddress ?? '127.0.0.1');
    const server = net.createServer();
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(0, localAddress, () => {
        server.removeListener('error', reject);
        resolve();
      });
    });
    return new ActiveDataChannel(server, ftp, acceptTimeoutMs);
  }

  get closed(): boolean {
    return this._closed;
  }

  get command(): string {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error(CONNECTION_ERRORS.ACTIVE_MODE_FAILED);
    }
    return buildPortCommand(address.address, address.port);
  }

  /** Espera la conexión del servidor (o la devuelve si ya llegó). */
  accept(): Promise<Socket> {
    if (this.accepted) return Promise.resolve(this.accepted);
    if (this.failure) return Promise.reject(this.failure);
    return new Promise<Socket>((resolve, reject) => {
      this.waiter = { resolve, reject };
      this.timer = setTimeout(() => {
        this.fail(new Error(CONNECTION_ERRORS.DATA_CONNECTION_TIMEOUT));
      }, this.acceptTimeoutMs);
    });
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.fail(new Error(CONNECTION_ERRORS.SESSION_CLOSED));
    this.accepted?.destroy();
    this.server.close();
  }

  private onConnection(raw: Socket): void {
    if (this.accepted || this._closed) {
      raw.destroy();
      return;
    }
    raw.on('error', error => log.debug(`Error en socket de datos activo: ${error.message}`));
    let socket: Socket = raw;
    const control = this.ftp.socket;
    if (control instanceof TLSSocket) {
      socket = tls.connect({ ...this.ftp.tlsOptions, socket: raw, session: control.getSession() });
    }
    this.accepted = socket;
    log.debug(`Conexión de datos activa desde ${raw.remoteAddress ?? '?'}:${raw.remotePort ?? '?'}`);
    this.clearTimer();
    this.waiter?.resolve(socket);
    this.waiter = null;
    this.server.close();
  }

  private fail(error: Error): void {
    this.clearTimer();
    if (this.accepted) return;
    if (!this.failure) this.failure = error;
    this.waiter?.reject(error);
    this.waiter = null;
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
