/**
 * Tests unitarios para src/engines/DirectoryLister.ts
 */
import { DirectoryLister, parseStructuredLine, sortEntries } from '../../src/engines/DirectoryLister';
import { ProtocolError } from '../../src/engines/errors';
import { createConfig } from '../../src/config';
import { FakeFtpServer, type FakeServerOptions } from '../helpers/fakeSession';

function buildServer(options: FakeServerOptions = {}): FakeFtpServer {
  return new FakeFtpServer({
    dirs: ['/pub', '/pub/Games', '/pub/apps'],
    files: {
      '/pub/readme.txt': Buffer.from('hola'),
      '/pub/Zeta.bin': Buffer.alloc(2048),
      '/pub/alpha.iso': Buffer.alloc(10),
    },
    ...options,
  });
}

describe('DirectoryLister', () => {
  describe('parseStructuredLine', () => {
    it('debe extraer tipo, tamaño, fecha y nombre con espacios', () => {
      expect(parseStructuredLine('type=file;size=1024;modify=20240101120000; file name.txt')).toEqual({
        name: 'file name.txt',
        kind: 'file',
        size: 1024,
        modifiedTimestamp: '20240101120000',
      });
    });

    it('debe ignorar mayúsculas en los facts', () => {
      expect(parseStructuredLine('Type=DIR;Modify=20230101000000; Sub')).toEqual({
        name: 'Sub',
        kind: 'dir',
        size: null,
        modifiedTimestamp: '20230101000000',
      });
    });

    it('debe omitir cdir/pdir y líneas sin nombre', () => {
      expect(parseStructuredLine('type=cdir; .')).toBeNull();
      expect(parseStructuredLine('type=pdir; ..')).toBeNull();
      expect(parseStructuredLine('sinespacio')).toBeNull();
    });

    it('debe dejar size en null si no es numérico', () => {
      expect(parseStructuredLine('type=file;size=abc; x')?.size).toBeNull();
    });
  });

  describe('sortEntries', () => {
    it('debe poner directorios primero y ordenar sin distinguir mayúsculas', () => {
      const sorted = sortEntries([
        { name: 'b.txt', kind: 'file', size: 1, modifiedTimestamp: null },
        { name: 'Z', kind: 'dir', size: null, modifiedTimestamp: null },
        { name: 'A.txt', kind: 'file', size: 1, modifiedTimestamp: null },
        { name: 'a', kind: 'dir', size: null, modifiedTimestamp: null },
      ]);
      expect(sorted.map(e => e.name)).toEqual(['a', 'Z', 'A.txt', 'b.txt']);
    });
  });

  describe('list', () => {
    it('debe listar con MLSD y ordenar el resultado', async () => {
      const server = buildServer();
      const session = server.createSession();
      const lister = new DirectoryLister();

      const entries = await lister.list(session, '/pub');

      expect(entries).toEqual([
        { name: 'apps', kind: 'dir', size: null, modifiedTimestamp: '20240102030405' },
        { name: 'Games', kind: 'dir', size: null, modifiedTimestamp: '20240102030405' },
        { name: 'alpha.iso', kind: 'file', size: 10, modifiedTimestamp: '20240102030405' },
        { name: 'readme.txt', kind: 'file', size: 4, modifiedTimestamp: '20240102030405' },
        { name: 'Zeta.bin', kind: 'file', size: 2048, modifiedTimestamp: '20240102030405' },
      ]);
      expect(session.cwd).toBe('/pub');
    });

    it('sin MLSD debe clasificar con CWD y dejar la sesión en el directorio listado', async () => {
      const server = buildServer({ structuredListing: false });
      const session = server.createSession();
      const lister = new DirectoryLister();

      const entries = await lister.list(session, '/pub');

      expect(entries).toEqual([
        { name: 'apps', kind: 'dir', size: null, modifiedTimestamp: null },
        { name: 'Games', kind: 'dir', size: null, modifiedTimestamp: null },
        { name: 'alpha.iso', kind: 'file', size: 10, modifiedTimestamp: null },
        { name: 'readme.txt', kind: 'file', size: 4, modifiedTimestamp: null },
        { name: 'Zeta.bin', kind: 'file', size: 2048, modifiedTimestamp: null },
      ]);
      expect(session.cwd).toBe('/pub');
    });

    it('sin SIZE debe dejar los tamaños de archivo en null', async () => {
      const server = buildServer({ structuredListing: false, sizeSupported: false });
      const entries = await new DirectoryLister().list(server.createSession(), '/pub');
      expect(entries.filter(e => e.kind === 'file').map(e => e.size)).toEqual([null, null, null]);
    });

    it('debe reintentar un fallo transitorio del listado', async () => {
      const sleeps: number[] = [];
      const server = buildServer({ failListTimes: 1 });
      const lister = new DirectoryLister({
        sleep: async ms => {
          sleeps.push(ms);
        },
      });

      const entries = await lister.list(server.createSession(), '/pub');

      expect(entries).toHaveLength(5);
      expect(sleeps).toEqual([1000]);
    });

    it('debe lanzar ProtocolError al agotar los intentos', async () => {
      const server = buildServer({ failListTimes: 2 });
      const lister = new DirectoryLister({ sleep: async () => undefined });

      const error = await lister.list(server.createSession(), '/pub').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({
        attempts: 2,
        message: 'Error al listar el directorio /pub (2 intentos): Timeout (data socket)',
      });
    });

    it('debe hacer todos los intentos aunque el directorio no exista (550)', async () => {
      const sleeps: number[] = [];
      const server = buildServer();
      const lister = new DirectoryLister({
        config: createConfig({ listing: { listRetries: 3 } }),
        sleep: async ms => {
          sleeps.push(ms);
        },
      });

      const error = await lister.list(server.createSession(), '/nada').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({
        attempts: 3,
        message: 'Error al listar el directorio /nada (3 intentos): 550 /nada: No such directory',
      });
      expect(sleeps).toEqual([1000, 2000]);
    });
  });
});
