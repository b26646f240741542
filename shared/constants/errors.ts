/**
 * @fileoverview Constantes de mensajes de error del motor de transferencias FTP.
 * @module shared/constants/errors
 *
 * Fuente única de verdad para textos de error. Los motores construyen sus mensajes
 * a partir de estas claves y añaden intentos y el detalle del error de transporte.
 */

// =====================
// ERRORES GENERALES
// =====================

export const GENERAL_ERRORS: Record<string, string> = {
  UNKNOWN: 'Error desconocido',
  UNEXPECTED: 'Error inesperado',
  OPERATION_FAILED: 'Error en la operación',
};

// =====================
// ERRORES DE CONEXIÓN
// =====================

export const CONNECTION_ERRORS: Record<string, string> = {
  CONNECT_FAILED: 'No se pudo conectar al servidor',
  LOGIN_FAILED: 'Autenticación rechazada por el servidor',
  TLS_FAILED: 'No se pudo negociar TLS explícito',
  PROTECT_FAILED: 'No se pudo proteger el canal de datos',
  NOT_CONNECTED: 'La sesión FTP no está abierta',
  SESSION_CLOSED: 'La sesión FTP se cerró',
  NO_DATA_CONNECTION: 'No hay conexión de datos disponible',
  ACTIVE_MODE_FAILED: 'No se pudo abrir el canal de datos en modo activo',
  DATA_CONNECTION_TIMEOUT: 'El servidor no abrió la conexión de datos a tiempo',
};

// =====================
// ERRORES DE LISTADO
// =====================

export const LISTING_ERRORS: Record<string, string> = {
  LIST_FAILED: 'Error al listar el directorio',
  CHANGE_DIR_FAILED: 'No se pudo entrar en el directorio',
  PWD_FAILED: 'No se pudo obtener el directorio actual',
};

// =====================
// ERRORES DE TRANSFERENCIA
// =====================

export const TRANSFER_ERRORS: Record<string, string> = {
  DOWNLOAD_FAILED: 'Error al descargar el archivo',
  CANCELLED: 'Transferencia cancelada',
  SIZE_UNKNOWN: 'Tamaño remoto desconocido: no se puede segmentar',
  INVALID_REQUEST: 'Solicitud de transferencia inválida',
};

// =====================
// ERRORES DE SEGMENTOS
// =====================

export const SEGMENT_ERRORS: Record<string, string> = {
  SEGMENT_FAILED: 'Segmento fallido',
  SHORT_READ: 'El servidor cerró la transferencia antes de completar la cuota',
  PARTIAL_FAILURE: 'Descarga segmentada incompleta',
  MERGE_SIZE_MISMATCH: 'Tamaño incorrecto después de merge',
  MISSING_PART: 'Falta el archivo temporal del segmento',
};

// =====================
// ERRORES DE ARCHIVO
// =====================

export const FILE_ERRORS: Record<string, string> = {
  NOT_FOUND: 'Archivo no encontrado',
  CREATE_DIRECTORY_FAILED: 'Error al crear directorio',
  WRITE_FAILED: 'Error al escribir el archivo local',
  DELETE_FAILED: 'Error al eliminar archivo',
};

// =====================
// ERRORES DE VALIDACIÓN
// =====================

export const VALIDATION_ERRORS: Record<string, string> = {
  INVALID_ENDPOINT: 'Servidor FTP inválido',
  INVALID_CONFIG: 'Configuración inválida',
  INVALID_PATH: 'Ruta inválida',
};

export interface ErrorsMap {
  GENERAL: typeof GENERAL_ERRORS;
  CONNECTION: typeof CONNECTION_ERRORS;
  LISTING: typeof LISTING_ERRORS;
  TRANSFER: typeof TRANSFER_ERRORS;
  SEGMENT: typeof SEGMENT_ERRORS;
  FILE: typeof FILE_ERRORS;
  VALIDATION: typeof VALIDATION_ERRORS;
}

export const ERRORS: ErrorsMap = {
  GENERAL: GENERAL_ERRORS,
  CONNECTION: CONNECTION_ERRORS,
  LISTING: LISTING_ERRORS,
  TRANSFER: TRANSFER_ERRORS,
  SEGMENT: SEGMENT_ERRORS,
  FILE: FILE_ERRORS,
  VALIDATION: VALIDATION_ERRORS,
};

export default ERRORS;
