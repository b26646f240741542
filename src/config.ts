/**
 * Configuración por defecto del motor de transferencias (valores de runtime).
 *
 * Aquí se definen timeouts, presupuestos de reintentos, tamaño de bloque y el tope
 * de segmentos. Los colaboradores que necesiten otros valores construyen una copia
 * con createConfig(overrides); el objeto por defecto no se modifica.
 *
 * @module config
 */

import type { AppConfig, AppConfigOverrides } from './configTypes';
import { configOverridesSchema, validate } from './utils/schemas';
import { VALIDATION_ERRORS } from './constants/errors';

/** Tope absoluto de segmentos concurrentes por transferencia. */
export const MAX_SEGMENTS = 8;

const config: AppConfig = {
  network: {
    timeoutSeconds: 15,
    connectRetries: 3,
    connectRetryDelayMs: 1500,
    activeModeAcceptTimeoutMs: 15000,
    verifyTlsCertificates: true,
  },

  listing: {
    listRetries: 2,
    listRetryDelayMs: 1000,
  },

  transfer: {
    downloadRetries: 4,
    downloadRetryDelayMs: 1500,
    blockSize: 64 * 1024,
    maxSegments: MAX_SEGMENTS,
    segmentedThresholdBlocks: 10,
    progressIntervalMs: 0,
    cleanupOnComplete: true,
  },

  endpointDefaults: {
    port: 21,
    useEncryptedTransport: false,
    passiveMode: true,
  },

  logging: {
    fileLevel: 'info',
    consoleLevel: 'debug',
    maxSize: 10 * 1024 * 1024,
  },
};

/**
 * Devuelve una configuración nueva mezclando overrides (validados con zod) sobre los
 * valores por defecto. maxSegments se limita siempre a MAX_SEGMENTS.
 *
 * @throws Error si los overrides no pasan la validación.
 */
export function createConfig(overrides: AppConfigOverrides = {}): AppConfig {
  const result = validate(configOverridesSchema, overrides);
  if (!result.success) {
    throw new Error(`${VALIDATION_ERRORS.INVALID_CONFIG}: ${result.error}`);
  }
  const o = result.data;
  const merged: AppConfig = {
    network: { ...config.network, ...o.network },
    listing: { ...config.listing, ...o.listing },
    transfer: { ...config.transfer, ...o.transfer },
    endpointDefaults: { ...config.endpointDefaults, ...o.endpointDefaults },
    logging: { ...config.logging, ...o.logging },
  };
  merged.transfer.maxSegments = Math.min(MAX_SEGMENTS, merged.transfer.maxSegments);
  return merged;
}

export default config;
