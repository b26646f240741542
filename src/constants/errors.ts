/**
 * @fileoverview Reexporta las constantes de error definidas en shared para uso en el motor.
 * @module constants/errors
 *
 * Permite importar desde 'src/constants/errors' en lugar de rutas relativas a shared.
 * La fuente de verdad es shared/constants/errors.ts.
 */

export {
  ERRORS,
  GENERAL_ERRORS,
  CONNECTION_ERRORS,
  LISTING_ERRORS,
  TRANSFER_ERRORS,
  SEGMENT_ERRORS,
  FILE_ERRORS,
  VALIDATION_ERRORS,
  type ErrorsMap,
} from '../../shared/constants/errors';

export { default } from '../../shared/constants/errors';
