/**
 * Tests unitarios para src/utils/schemas.ts, src/config.ts y resolveEndpoint
 */
import { validateEndpoint, validateTransferRequest } from '../../src/utils/schemas';
import config, { createConfig, MAX_SEGMENTS } from '../../src/config';
import { resolveEndpoint } from '../../src/engines/TransferEngine';

describe('schemas', () => {
  describe('validateEndpoint', () => {
    it('debe recortar el host y usar credenciales anónimas por defecto', () => {
      const result = validateEndpoint({ host: '  ftp.example.org ' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toMatchObject({
          host: 'ftp.example.org',
          username: 'anonymous',
          password: '',
        });
      }
    });

    it('debe rechazar un host vacío', () => {
      expect(validateEndpoint({ host: '   ' })).toEqual({
        success: false,
        error: 'host: El host no puede estar vacío',
      });
    });

    it('debe rechazar puertos fuera de rango', () => {
      expect(validateEndpoint({ host: 'h', port: 70000 })).toEqual({
        success: false,
        error: 'port: El puerto debe estar entre 1 y 65535',
      });
    });
  });

  describe('validateTransferRequest', () => {
    it('debe aplicar segmentCount 1 y modo auto por defecto', () => {
      const result = validateTransferRequest({ remotePath: '/a.bin', localPath: '/tmp/a.bin' });
      expect(result).toEqual({
        success: true,
        data: { remotePath: '/a.bin', localPath: '/tmp/a.bin', segmentCount: 1, mode: 'auto' },
      });
    });

    it('debe rechazar segmentCount 0 y rutas vacías', () => {
      expect(
        validateTransferRequest({ remotePath: '/a', localPath: '/b', segmentCount: 0 })
      ).toEqual({ success: false, error: 'segmentCount: El valor debe ser positivo' });
      expect(validateTransferRequest({ remotePath: '', localPath: '/b' })).toEqual({
        success: false,
        error: 'remotePath: La ruta no puede estar vacía',
      });
    });

    it('debe rechazar un modo desconocido', () => {
      expect(
        validateTransferRequest({ remotePath: '/a', localPath: '/b', mode: 'parallel' }).success
      ).toBe(false);
    });
  });
});

describe('createConfig', () => {
  it('debe limitar maxSegments al tope absoluto', () => {
    expect(createConfig({ transfer: { maxSegments: 20 } }).transfer.maxSegments).toBe(MAX_SEGMENTS);
    expect(createConfig({ transfer: { maxSegments: 3 } }).transfer.maxSegments).toBe(3);
  });

  it('no debe modificar la configuración por defecto', () => {
    const custom = createConfig({ transfer: { downloadRetries: 9 }, listing: { listRetries: 5 } });
    expect(custom.transfer.downloadRetries).toBe(9);
    expect(custom.transfer.blockSize).toBe(64 * 1024);
    expect(custom.listing.listRetries).toBe(5);
    expect(config.transfer.downloadRetries).toBe(4);
    expect(config.listing.listRetries).toBe(2);
  });

  it('debe rechazar overrides inválidos', () => {
    expect(() => createConfig({ network: { connectRetries: 0 } })).toThrow(
      'Configuración inválida: network.connectRetries: El valor debe ser positivo'
    );
  });
});

describe('resolveEndpoint', () => {
  it('debe completar puerto, modo y cifrado con los valores por defecto', () => {
    const endpoint = resolveEndpoint({ host: 'ftp.example.org', username: 'u', password: 'test-secret' });
    expect(endpoint).toEqual({
      host: 'ftp.example.org',
      port: 21,
      username: 'u',
      password: 'test-secret',
      useEncryptedTransport: false,
      passiveMode: true,
    });
    expect(Object.isFrozen(endpoint)).toBe(true);
  });

  it('debe respetar los valores explícitos', () => {
    const endpoint = resolveEndpoint({ host: 'h', port: 2121, passiveMode: false });
    expect(endpoint.port).toBe(2121);
    expect(endpoint.passiveMode).toBe(false);
  });

  it('debe lanzar con un endpoint inválido', () => {
    expect(() => resolveEndpoint({ host: '' })).toThrow(
      'Servidor FTP inválido: host: El host no puede estar vacío'
    );
  });
});
