/**
 * Tests unitarios para src/utils/format.ts y src/utils/remotePath.ts
 */
import { formatBytes, formatEta, formatProgressLine } from '../../src/utils/format';
import { joinRemotePath, parentRemotePath, remoteBasename } from '../../src/utils/remotePath';

describe('format', () => {
  describe('formatBytes', () => {
    it("debe devolver '?' para tamaños desconocidos", () => {
      expect(formatBytes(null)).toBe('?');
      expect(formatBytes(undefined)).toBe('?');
    });

    it('debe usar dos decimales y la unidad adecuada', () => {
      expect(formatBytes(0)).toBe('0.00 B');
      expect(formatBytes(1536)).toBe('1.50 KB');
      expect(formatBytes(1024 * 1024)).toBe('1.00 MB');
      expect(formatBytes(5 * 1024 ** 4)).toBe('5.00 TB');
      expect(formatBytes(1024 ** 5)).toBe('1024.00 TB');
    });
  });

  describe('formatEta', () => {
    it('debe formatear HH:MM:SS', () => {
      expect(formatEta(3661)).toBe('01:01:01');
      expect(formatEta(59.9)).toBe('00:00:59');
    });

    it('debe mostrar guiones sin estimación', () => {
      expect(formatEta(0)).toBe('--:--:--');
      expect(formatEta(Infinity)).toBe('--:--:--');
    });
  });

  describe('formatProgressLine', () => {
    it('debe incluir porcentaje, tamaños, velocidad y ETA', () => {
      expect(
        formatProgressLine({
          bytesTransferred: 1024,
          totalBytes: 20480,
          speedBytesPerSecond: 512,
          etaSeconds: 37,
        })
      ).toBe('  5.0%  1.00 KB / 20.00 KB  |  512.00 B/s  ETA 00:00:37');
    });

    it('sin tamaño total debe mostrar solo bytes y velocidad', () => {
      expect(
        formatProgressLine({
          bytesTransferred: 2048,
          totalBytes: 0,
          speedBytesPerSecond: 0,
          etaSeconds: 0,
        })
      ).toBe('2.00 KB  |  ?');
    });
  });
});

describe('remotePath', () => {
  it('joinRemotePath debe unir con una sola barra', () => {
    expect(joinRemotePath('/', 'a')).toBe('/a');
    expect(joinRemotePath('/pub', 'a')).toBe('/pub/a');
    expect(joinRemotePath('/pub/', 'a')).toBe('/pub/a');
  });

  it('parentRemotePath debe subir un nivel y quedarse en la raíz', () => {
    expect(parentRemotePath('/pub/games')).toBe('/pub');
    expect(parentRemotePath('/pub/games/')).toBe('/pub');
    expect(parentRemotePath('/pub')).toBe('/');
    expect(parentRemotePath('/')).toBe('/');
  });

  it('remoteBasename debe devolver el último componente', () => {
    expect(remoteBasename('/pub/a.bin')).toBe('a.bin');
  });
});
