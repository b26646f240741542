/**
 * Punto de entrada del paquete.
 *
 * Reexporta el motor de transferencias, la configuración, el logger y los tipos
 * que usa el colaborador (ServerEndpoint, TransferRequest, snapshots de progreso).
 *
 * @module index
 */

export * from './engines';
export { default as config, createConfig, MAX_SEGMENTS } from './config';
export type { AppConfig, AppConfigOverrides } from './configTypes';
export {
  logger,
  configureLogger,
  formatBytes,
  formatEta,
  formatProgressLine,
  joinRemotePath,
  parentRemotePath,
  remoteBasename,
} from './utils';
export type { EndpointInput, TransferRequestInput } from './utils/schemas';
export { ERRORS } from './constants/errors';
export type * from '../shared/types';
