/**
 * @fileoverview Constantes de validación: límites numéricos y mensajes usados por los schemas Zod.
 * @module constants/validations
 */

// =====================
// LÍMITES NUMÉRICOS
// =====================

/** Longitud máxima de un nombre de host (RFC 1035). */
export const MAX_HOST_LENGTH = 253;

/** Longitud máxima aceptada para rutas locales y remotas. */
export const MAX_PATH_LENGTH = 4096;

// =====================
// VALIDACIONES DE SERVIDOR
// =====================

const ENDPOINT_VALIDATIONS: Record<string, string> = {
  HOST_CANNOT_BE_EMPTY: 'El host no puede estar vacío',
  HOST_TOO_LONG: 'El host es demasiado largo',
  PORT_MUST_BE_INTEGER: 'El puerto debe ser un número entero',
  PORT_OUT_OF_RANGE: 'El puerto debe estar entre 1 y 65535',
};

// =====================
// VALIDACIONES DE RUTA
// =====================

const PATH_VALIDATIONS: Record<string, string> = {
  CANNOT_BE_EMPTY: 'La ruta no puede estar vacía',
  TOO_LONG: 'La ruta es demasiado larga',
};

// =====================
// VALIDACIONES NUMÉRICAS
// =====================

const NUMBER_VALIDATIONS: Record<string, string> = {
  MUST_BE_INTEGER: 'El valor debe ser un número entero',
  MUST_BE_POSITIVE: 'El valor debe ser positivo',
  MUST_BE_NON_NEGATIVE: 'El valor no puede ser negativo',
};

// =====================
// VALIDACIONES GENÉRICAS
// =====================

const GENERIC_VALIDATIONS: Record<string, string> = {
  VALIDATION_ERROR: 'Error de validación',
};

// =====================
// EXPORTACIÓN
// =====================

export interface ValidationsLimits {
  MAX_HOST_LENGTH: number;
  MAX_PATH_LENGTH: number;
}

/** Objeto unificado de validaciones por categoría y LIMITS con valores numéricos. */
export const VALIDATIONS = {
  ENDPOINT: ENDPOINT_VALIDATIONS,
  PATH: PATH_VALIDATIONS,
  NUMBER: NUMBER_VALIDATIONS,
  GENERIC: GENERIC_VALIDATIONS,
  LIMITS: {
    MAX_HOST_LENGTH,
    MAX_PATH_LENGTH,
  } satisfies ValidationsLimits,
};

export { ENDPOINT_VALIDATIONS, PATH_VALIDATIONS, NUMBER_VALIDATIONS, GENERIC_VALIDATIONS };
