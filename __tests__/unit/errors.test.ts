/**
 * Tests unitarios para src/engines/errors.ts
 */
import {
  ConnectionError,
  FtpEngineError,
  PartialFailureError,
  TransferError,
  describeCause,
} from '../../src/engines/errors';
import { runInNewContext } from 'vm';

describe('errors', () => {
  it('debe incluir intentos y el texto del error original en el mensaje', () => {
    const cause = new Error('read ECONNRESET');
    const error = new TransferError('Error al descargar el archivo /pub/a.bin', {
      attempts: 4,
      cause,
    });

    expect(error.message).toBe('Error al descargar el archivo /pub/a.bin (4 intentos): read ECONNRESET');
    expect(error.attempts).toBe(4);
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('TransferError');
    expect(error).toBeInstanceOf(FtpEngineError);
    expect(error).toBeInstanceOf(Error);
  });

  it('debe usar singular con un solo intento', () => {
    const error = new ConnectionError('No se pudo conectar al servidor h:21', {
      attempts: 1,
      cause: '530 Login incorrect',
    });
    expect(error.message).toBe('No se pudo conectar al servidor h:21 (1 intento): 530 Login incorrect');
  });

  it('debe dejar el mensaje base sin intentos ni causa', () => {
    const error = new FtpEngineError('Base');
    expect(error.message).toBe('Base');
    expect(error.attempts).toBe(0);
  });

  it('PartialFailureError debe nombrar los segmentos fallidos', () => {
    const error = new PartialFailureError('Descarga segmentada incompleta', [
      { segmentId: 1, error: new Error('x') },
      { segmentId: 3, error: new Error('y') },
    ]);

    expect(error.message).toBe(
      'Descarga segmentada incompleta: segmentos fallidos 1, 3: [seg 1] x; [seg 3] y'
    );
    expect(error.failedSegmentIds).toEqual([1, 3]);
    expect(error.name).toBe('PartialFailureError');
  });

  describe('describeCause', () => {
    it('debe devolver el mensaje, el texto o vacío', () => {
      expect(describeCause(new Error('boom'))).toBe('boom');
      expect(describeCause('texto')).toBe('texto');
      expect(describeCause(undefined)).toBe('');
      expect(describeCause(null)).toBe('');
    });

    it('debe leer el mensaje de errores creados en otro contexto', () => {
      const foreign: unknown = runInNewContext("new Error('ENOENT: no such file or directory')");
      expect(foreign instanceof Error).toBe(false);
      expect(describeCause(foreign)).toBe('ENOENT: no such file or directory');
    });
  });
});
