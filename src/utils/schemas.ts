/**
 * @fileoverview Schemas de validación usando Zod para los datos que entrega el colaborador
 * (servidor, solicitud de transferencia y overrides de configuración).
 * @module schemas
 */

import { z } from 'zod';
import { VALIDATIONS } from '../constants/validations';

export type ZodValidationResult<T = unknown> =
  | { success: true; data: T }
  | { success: false; error: string };

const logLevelSchema = z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']);

const positiveInt = z
  .number()
  .int(VALIDATIONS.NUMBER.MUST_BE_INTEGER)
  .positive(VALIDATIONS.NUMBER.MUST_BE_POSITIVE);

const nonNegativeInt = z
  .number()
  .int(VALIDATIONS.NUMBER.MUST_BE_INTEGER)
  .nonnegative(VALIDATIONS.NUMBER.MUST_BE_NON_NEGATIVE);

const pathSchema = z
  .string()
  .min(1, VALIDATIONS.PATH.CANNOT_BE_EMPTY)
  .max(VALIDATIONS.LIMITS.MAX_PATH_LENGTH, VALIDATIONS.PATH.TOO_LONG);

export const endpointSchema = z.object({
  host: z
    .string()
    .transform(val => val.trim())
    .pipe(
      z
        .string()
        .min(1, VALIDATIONS.ENDPOINT.HOST_CANNOT_BE_EMPTY)
        .max(VALIDATIONS.LIMITS.MAX_HOST_LENGTH, VALIDATIONS.ENDPOINT.HOST_TOO_LONG)
    ),
  port: z
    .number()
    .int(VALIDATIONS.ENDPOINT.PORT_MUST_BE_INTEGER)
    .min(1, VALIDATIONS.ENDPOINT.PORT_OUT_OF_RANGE)
    .max(65535, VALIDATIONS.ENDPOINT.PORT_OUT_OF_RANGE)
    .optional(),
  username: z.string().default('anonymous'),
  password: z.string().default(''),
  useEncryptedTransport: z.boolean().optional(),
  passiveMode: z.boolean().optional(),
});

export const transferRequestSchema = z.object({
  remotePath: pathSchema,
  localPath: pathSchema,
  expectedSize: nonNegativeInt.optional(),
  segmentCount: positiveInt.default(1),
  mode: z.enum(['auto', 'single', 'segmented']).default('auto'),
});

export const configOverridesSchema = z
  .object({
    network: z
      .object({
        timeoutSeconds: z.number().positive(VALIDATIONS.NUMBER.MUST_BE_POSITIVE),
        connectRetries: positiveInt,
        connectRetryDelayMs: nonNegativeInt,
        activeModeAcceptTimeoutMs: positiveInt,
        verifyTlsCertificates: z.boolean(),
      })
      .partial(),
    listing: z
      .object({
        listRetries: positiveInt,
        listRetryDelayMs: nonNegativeInt,
      })
      .partial(),
    transfer: z
      .object({
        downloadRetries: positiveInt,
        downloadRetryDelayMs: nonNegativeInt,
        blockSize: positiveInt,
        maxSegments: positiveInt,
        segmentedThresholdBlocks: nonNegativeInt,
        progressIntervalMs: nonNegativeInt,
        cleanupOnComplete: z.boolean(),
      })
      .partial(),
    endpointDefaults: z
      .object({
        port: positiveInt.max(65535, VALIDATIONS.ENDPOINT.PORT_OUT_OF_RANGE),
        useEncryptedTransport: z.boolean(),
        passiveMode: z.boolean(),
      })
      .partial(),
    logging: z
      .object({
        fileLevel: logLevelSchema,
        consoleLevel: logLevelSchema,
        maxSize: positiveInt,
      })
      .partial(),
  })
  .partial();

export type EndpointInput = z.input<typeof endpointSchema>;
export type TransferRequestInput = z.input<typeof transferRequestSchema>;

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ZodValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return {
      success: true,
      data: result.data,
    };
  }
  const errorMessages = result.error.issues.map((err: z.ZodIssue) => {
    const pathStr = err.path.length > 0 ? `${err.path.join('.')}: ` : '';
    return `${pathStr}${err.message}`;
  });

  return {
    success: false,
    error: errorMessages.join('; ') || VALIDATIONS.GENERIC.VALIDATION_ERROR,
  };
}

export function validateEndpoint(
  endpoint: unknown
): ZodValidationResult<z.infer<typeof endpointSchema>> {
  return validate(endpointSchema, endpoint);
}

export function validateTransferRequest(
  request: unknown
): ZodValidationResult<z.infer<typeof transferRequestSchema>> {
  return validate(transferRequestSchema, request);
}

export const schemas = {
  endpoint: endpointSchema,
  transferRequest: transferRequestSchema,
  configOverrides: configOverridesSchema,
};
