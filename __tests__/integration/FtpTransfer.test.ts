/**
 * Tests de integración del motor contra un servidor FTP en el propio proceso.
 *
 * Prueba el recorrido completo con basic-ftp real:
 * - FtpConnectionFactory (USER/PASS, TYPE I) y BasicFtpSession
 * - DirectoryLister con MLSD y con NLST + sondeo CWD
 * - Descarga de flujo único en modo pasivo y activo, reanudación con REST
 * - Descarga segmentada con corte por cuota y merge final
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createConfig } from '../../src/config';
import { ConnectionError } from '../../src/engines/errors';
import { EventBus } from '../../src/engines/EventBus';
import { TransferEngine } from '../../src/engines/TransferEngine';
import { patternBuffer } from '../helpers/fakeSession';
import { InProcessFtpServer, type InProcessFtpOptions } from '../helpers/inProcessFtpServer';

jest.setTimeout(20000);

const DATA = patternBuffer(300_000);
const BIG = patternBuffer(700_000);

const testConfig = createConfig({
  network: { timeoutSeconds: 5, connectRetryDelayMs: 0, activeModeAcceptTimeoutMs: 5000 },
  listing: { listRetryDelayMs: 0 },
  transfer: { downloadRetryDelayMs: 0 },
});

describe('Transferencias FTP (servidor en proceso)', () => {
  let server: InProcessFtpServer | null = null;
  let engine: TransferEngine | null = null;
  let dir: string;

  async function start(
    options: Partial<InProcessFtpOptions> = {},
    endpoint: { passiveMode?: boolean; password?: string } = {}
  ): Promise<{ ftp: InProcessFtpServer; client: TransferEngine }> {
    const ftp = new InProcessFtpServer({
      dirs: ['/pub', '/pub/sub'],
      files: {
        '/pub/data.bin': DATA,
        '/pub/big.bin': BIG,
        '/pub/small.txt': Buffer.from('hola mundo'),
      },
      ...options,
    });
    await ftp.start();
    const client = new TransferEngine(
      {
        host: '127.0.0.1',
        port: ftp.port,
        username: 'test-user',
        password: endpoint.password ?? 'test-secret',
        passiveMode: endpoint.passiveMode ?? true,
      },
      { config: testConfig, eventBus: new EventBus() }
    );
    server = ftp;
    engine = client;
    return { ftp, client };
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ftp-transfer-'));
  });

  afterEach(async () => {
    engine?.close();
    engine = null;
    await server?.stop();
    server = null;
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('listado', () => {
    it('debe listar con MLSD y dejar la sesión en el directorio', async () => {
      const { client } = await start();

      const entries = await client.list('/pub');

      expect(entries).toEqual([
        { name: 'sub', kind: 'dir', size: null, modifiedTimestamp: '20240102030405' },
        { name: 'big.bin', kind: 'file', size: 700_000, modifiedTimestamp: '20240102030405' },
        { name: 'data.bin', kind: 'file', size: 300_000, modifiedTimestamp: '20240102030405' },
        { name: 'small.txt', kind: 'file', size: 10, modifiedTimestamp: '20240102030405' },
      ]);
      expect(await client.pwd()).toBe('/pub');
    });

    it('sin MLST debe usar NLST y clasificar con CWD', async () => {
      const { ftp, client } = await start({ structuredListing: false });

      const entries = await client.list('/pub');

      expect(entries).toEqual([
        { name: 'sub', kind: 'dir', size: null, modifiedTimestamp: null },
        { name: 'big.bin', kind: 'file', size: 700_000, modifiedTimestamp: null },
        { name: 'data.bin', kind: 'file', size: 300_000, modifiedTimestamp: null },
        { name: 'small.txt', kind: 'file', size: 10, modifiedTimestamp: null },
      ]);
      expect(ftp.commands).toContain('NLST');
      expect(await client.pwd()).toBe('/pub');
    });

    it("pwd debe devolver '/' si el servidor no implementa PWD", async () => {
      const { client } = await start({ pwdSupported: false });
      expect(await client.pwd()).toBe('/');
    });
  });

  describe('flujo único', () => {
    it('debe descargar en modo pasivo', async () => {
      const { ftp, client } = await start();
      const localPath = path.join(dir, 'data.bin');

      const result = await client.download({ remotePath: '/pub/data.bin', localPath, mode: 'single' });

      expect(result).toEqual({ localPath, mode: 'single', bytesWritten: 300_000, skipped: false });
      expect((await fs.readFile(localPath)).equals(DATA)).toBe(true);
      expect(ftp.retrRequests).toEqual([{ remotePath: '/pub/data.bin', offset: 0 }]);
      expect(ftp.commands).toContain('EPSV');
    });

    it('debe usar PASV si el servidor rechaza EPSV', async () => {
      const { ftp, client } = await start({ epsvSupported: false });
      const localPath = path.join(dir, 'small.txt');

      await client.download({ remotePath: '/pub/small.txt', localPath });

      expect(await fs.readFile(localPath, 'utf8')).toBe('hola mundo');
      expect(ftp.commands).toContain('PASV');
    });

    it('debe reanudar con REST desde el tamaño local', async () => {
      const { ftp, client } = await start();
      const localPath = path.join(dir, 'data.bin');
      await fs.writeFile(localPath, DATA.subarray(0, 100_000));

      await client.download({ remotePath: '/pub/data.bin', localPath });

      expect(ftp.commands).toContain('REST 100000');
      expect(ftp.retrRequests).toEqual([{ remotePath: '/pub/data.bin', offset: 100_000 }]);
      expect((await fs.readFile(localPath)).equals(DATA)).toBe(true);
    });

    it('no debe transferir si el archivo local ya está completo', async () => {
      const { ftp, client } = await start();
      const localPath = path.join(dir, 'data.bin');
      await fs.writeFile(localPath, DATA);

      const result = await client.download({ remotePath: '/pub/data.bin', localPath });

      expect(result.skipped).toBe(true);
      expect(ftp.retrRequests).toEqual([]);
    });

    it('debe descargar en modo activo con PORT', async () => {
      const { ftp, client } = await start({}, { passiveMode: false });
      const localPath = path.join(dir, 'data.bin');

      await client.download({ remotePath: '/pub/data.bin', localPath, mode: 'single' });

      expect(ftp.commands.some(c => c.startsWith('PORT 127,0,0,1,'))).toBe(true);
      expect(ftp.commands).not.toContain('EPSV');
      expect((await fs.readFile(localPath)).equals(DATA)).toBe(true);
    });
  });

  describe('segmentado', () => {
    it('debe descargar 4 segmentos y fusionarlos sin dejar temporales', async () => {
      const { ftp, client } = await start();
      const localPath = path.join(dir, 'data.bin');

      const result = await client.download({
        remotePath: '/pub/data.bin',
        localPath,
        segmentCount: 4,
        mode: 'segmented',
      });

      expect(result).toEqual({ localPath, mode: 'segmented', bytesWritten: 300_000, skipped: false });
      expect(ftp.retrRequests.map(r => r.offset).sort((a, b) => a - b)).toEqual([
        0, 75_000, 150_000, 225_000,
      ]);
      expect((await fs.readFile(localPath)).equals(DATA)).toBe(true);
      expect(await fs.readdir(dir)).toEqual(['data.bin']);
    });

    it('en modo auto debe segmentar un archivo grande', async () => {
      const { ftp, client } = await start();
      const localPath = path.join(dir, 'big.bin');

      const result = await client.download({ remotePath: '/pub/big.bin', localPath, segmentCount: 3 });

      expect(result.mode).toBe('segmented');
      expect(ftp.retrRequests.map(r => r.offset).sort((a, b) => a - b)).toEqual([
        0, 233_334, 466_668,
      ]);
      expect((await fs.readFile(localPath)).equals(BIG)).toBe(true);
    });
  });

  describe('conexión', () => {
    it('debe agotar connectRetries ante credenciales rechazadas', async () => {
      const { ftp, client } = await start({}, { password: 'wrong-secret' });

      const error = await client.open().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toMatchObject({
        attempts: 3,
        message: `No se pudo conectar al servidor 127.0.0.1:${ftp.port} (3 intentos): 530 Login incorrect`,
      });
      expect(ftp.commands.filter(c => c.startsWith('USER'))).toHaveLength(3);
    });
  });
});
