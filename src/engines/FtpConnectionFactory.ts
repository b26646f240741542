/**
 * Fábrica de sesiones FTP autenticadas sobre basic-ftp.
 *
 * Secuencia por intento: connect → AUTH TLS (si el endpoint lo pide) → login →
 * PBSZ 0 + PROT P (canal de datos protegido justo tras autenticarse) → TYPE I.
 * Un intento fallido cierra su cliente antes del siguiente; un 530 también se
 * reintenta, hasta agotar connectRetries.
 *
 * @module engines/FtpConnectionFactory
 */

import net from 'net';
import { Client } from 'basic-ftp';
import config from '../config';
import type { AppConfig } from '../configTypes';
import type { ServerEndpoint } from '../../shared/types';
import { CONNECTION_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { BasicFtpSession } from './BasicFtpSession';
import { ConnectionError } from './errors';
import { runWithRetry, type RetryInfo } from './RetryPolicy';
import type { ConnectionFactory, FtpSession } from './types';

const log = logger.child('ConnectionFactory');

export interface FtpConnectionFactoryDeps {
  config?: AppConfig;
  createClient?: (_timeoutMs: number) => Client;
  sleep?: (_ms: number) => Promise<void>;
  onRetry?: (_info: RetryInfo) => void;
}

export function describeEndpoint(endpoint: ServerEndpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

export class FtpConnectionFactory implements ConnectionFactory {
  private readonly config: AppConfig;
  private readonly createClient: (_timeoutMs: number) => Client;
  private readonly sleep: ((_ms: number) => Promise<void>) | undefined;
  private readonly onRetry: ((_info: RetryInfo) => void) | undefined;

  constructor(deps: FtpConnectionFactoryDeps = {}) {
    this.config = deps.config ?? config;
    this.createClient = deps.createClient ?? (timeoutMs => new Client(timeoutMs));
    this.sleep = deps.sleep;
    this.onRetry = deps.onRetry;
  }

  /**
   * Abre una sesión autenticada. El llamador es dueño de la sesión y debe cerrarla.
   *
   * @throws ConnectionError tras agotar network.connectRetries intentos.
   */
  connect(endpoint: ServerEndpoint): Promise<FtpSession> {
    const { connectRetries, connectRetryDelayMs } = this.config.network;
    const label = describeEndpoint(endpoint);
    return runWithRetry(attempt => this.connectOnce(endpoint, attempt), {
      attempts: connectRetries,
      baseDelayMs: connectRetryDelayMs,
      label: `Conexión a ${label}`,
      sleep: this.sleep,
      onRetry: this.onRetry,
      toError: (error, attempts) =>
        new ConnectionError(`${CONNECTION_ERRORS.CONNECT_FAILED} ${label}`, {
          attempts,
          cause: error,
        }),
    });
  }

  private async connectOnce(endpoint: ServerEndpoint, attempt: number): Promise<FtpSession> {
    const { timeoutSeconds, activeModeAcceptTimeoutMs, verifyTlsCertificates } =
      this.config.network;
    const label = describeEndpoint(endpoint);
    const client = this.createClient(timeoutSeconds * 1000);
    client.ftp.verbose = false;

    try {
      log.debug(`${label}: conectando (intento ${attempt})`);
      await client.connect(endpoint.host, endpoint.port);
      if (endpoint.useEncryptedTransport) {
        await client.useTLS({
          ...client.ftp.tlsOptions,
          host: endpoint.host,
          ...(net.isIP(endpoint.host) ? {} : { servername: endpoint.host }),
          rejectUnauthorized: verifyTlsCertificates,
        });
      }
      await client.login(endpoint.username, endpoint.password);
      if (endpoint.useEncryptedTransport) {
        await client.send('PBSZ 0');
        await client.send('PROT P');
      }
      await client.send('TYPE I');

      log.info(
        `Conectado a ${label} (PASV=${endpoint.passiveMode}, FTPS=${endpoint.useEncryptedTransport})`
      );
      return new BasicFtpSession(client, {
        endpoint,
        passiveMode: endpoint.passiveMode,
        activeModeAcceptTimeoutMs,
        label,
      });
    } catch (error) {
      client.close();
      throw error;
    }
  }
}

const connectionFactory = new FtpConnectionFactory();
export default connectionFactory;
