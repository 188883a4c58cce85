/**
 * Tidewater - Gateway Client Tests
 */

import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ReadableStream } from 'stream/web';
import { PARAMETER_KEYS, type JsonValue } from '@tidewater/shared';
import { GatewayClientService } from '../gateway-client.service';
import { canonicalizeResponse } from '../signature';
import { ParametersService } from '../../system/parameters.service';
import { InstalledUnitsService } from '../../system/installed-units.service';
import {
  ArtifactHashMismatchError,
  GatewayBadResponseError,
  GatewayBadSignatureError,
  GatewayInvalidResponseError,
  GatewayNotFoundError,
} from '../../common/errors';
import { mockConfigService } from '../../test/mock-config';
import { FakeInstalledUnits, FakeParameters } from '../../test/fake-stores';

// ============================================================================
// FIXTURES
// ============================================================================

const { publicKey, privateKey } = crypto.generateKeyPairSync('rsa', {
  modulusLength: 2048,
  publicKeyEncoding: { type: 'spki', format: 'pem' },
  privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
});

const tempPath = mkdtempSync(join(tmpdir(), 'tidewater-gateway-'));

const baseConfig: Record<string, string> = {
  UPDATE_SERVER_URL: 'https://gateway.test/api',
  UPDATE_GATEWAY_KEY: publicKey,
  UPDATE_GATEWAY_SIGNATURE_ALGORITHM: 'sha256',
  UPDATE_API_KEY: 'test-key',
  UPDATE_API_SECRET: Buffer.from('test-secret').toString('base64'),
  APP_URL: 'https://app.test',
  APP_IP: '10.0.0.5',
  TEMP_PATH: tempPath,
};

function signedResponse(payload: JsonValue, status = 200): Response {
  const signature = crypto.sign('sha256', canonicalizeResponse(payload), privateKey).toString('base64');
  return new Response(JSON.stringify(payload), { status, headers: { 'Rest-Sign': signature } });
}

function md5(value: string): string {
  return crypto.createHash('md5').update(value).digest('hex');
}

// ============================================================================
// TEST SETUP
// ============================================================================

describe('GatewayClientService', () => {
  let parameters: FakeParameters;
  let installedUnits: FakeInstalledUnits;
  let fetchSpy: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  async function createClient(overrides: Record<string, string> = {}): Promise<GatewayClientService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GatewayClientService,
        { provide: ConfigService, useValue: mockConfigService({ ...baseConfig, ...overrides }) },
        { provide: ParametersService, useValue: parameters },
        { provide: InstalledUnitsService, useValue: installedUnits },
      ],
    }).compile();

    return module.get<GatewayClientService>(GatewayClientService);
  }

  function sentRequest(index = 0): { url: string; form: URLSearchParams; headers: Headers } {
    const [input, init] = fetchSpy.mock.calls[index];
    return {
      url: String(input),
      form: new URLSearchParams(String(init?.body ?? '')),
      headers: new Headers(init?.headers),
    };
  }

  beforeEach(() => {
    parameters = new FakeParameters();
    installedUnits = new FakeInstalledUnits();
    installedUnits.add({ code: 'Acme.Blog', version: '1.0.2', createdAt: new Date('2023-05-01T10:00:00.000Z') });
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  afterAll(() => {
    rmSync(tempPath, { recursive: true, force: true });
  });

  // ============================================================================
  // requestData
  // ============================================================================

  describe('requestData', () => {
    it('posts the protocol fields and the installation fingerprint', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(signedResponse({ update: 0 }));

      await client.requestData('core/update', { build: '421' });

      const { url, form } = sentRequest();
      expect(url).toBe('https://gateway.test/api/core/update');
      expect(form.get('build')).toBe('421');
      expect(form.get('protocol_version')).toBe('1.3');
      expect(form.get('client')).toBe('Tidewater');

      const server = JSON.parse(Buffer.from(form.get('server') ?? '', 'base64').toString('utf8'));
      expect(server).toEqual({
        runtime: process.version,
        url: 'https://app.test',
        ip: '10.0.0.5',
        since: '2023-05-01T10:00:00.000Z',
      });
    });

    it('signs the form body with the API secret', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(signedResponse({ update: 0 }));

      await client.requestData('core/update');

      const [, init] = fetchSpy.mock.calls[0];
      const body = String(init?.body);
      const { form, headers } = sentRequest();
      const expected = crypto.createHmac('sha512', Buffer.from('test-secret')).update(body).digest('base64');

      expect(form.get('nonce')).toMatch(/^\d{16,}$/);
      expect(headers.get('Rest-Key')).toBe('test-key');
      expect(headers.get('Rest-Sign')).toBe(expected);
    });

    it('sends neither nonce nor signature headers without a key pair', async () => {
      const client = await createClient({ UPDATE_API_KEY: '', UPDATE_API_SECRET: '' });
      fetchSpy.mockResolvedValueOnce(signedResponse({ update: 0 }));

      await client.requestData('core/update');

      const { form, headers } = sentRequest();
      expect(form.has('nonce')).toBe(false);
      expect(headers.has('Rest-Key')).toBe(false);
    });

    it('uses a key pair set at run time', async () => {
      const client = await createClient({ UPDATE_API_KEY: '', UPDATE_API_SECRET: '' });
      client.setSecurity('runtime-key', Buffer.from('test-secret').toString('base64'));
      fetchSpy.mockResolvedValueOnce(signedResponse({ update: 0 }));

      await client.requestData('core/update');

      expect(sentRequest().headers.get('Rest-Key')).toBe('runtime-key');
    });

    it('adds the project id, edge flag and basic auth when configured', async () => {
      parameters.values.set(PARAMETER_KEYS.PROJECT_ID, 'project-7');
      const client = await createClient({ EDGE_UPDATES: 'true', UPDATE_AUTH: 'user:pass' });
      fetchSpy.mockResolvedValueOnce(signedResponse({ update: 0 }));

      await client.requestData('core/update');

      const { form, headers } = sentRequest();
      expect(form.get('project')).toBe('project-7');
      expect(form.get('edge')).toBe('1');
      expect(headers.get('Authorization')).toBe(`Basic ${Buffer.from('user:pass').toString('base64')}`);
    });

    it('returns the verified payload', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(signedResponse({ update: 2, plugins: { 'Acme.Blog': { version: '1.0.3' } } }));

      await expect(client.requestData('core/update')).resolves.toEqual({
        update: 2,
        plugins: { 'Acme.Blog': { version: '1.0.3' } },
      });
    });

    it('maps 404 to GatewayNotFoundError', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(new Response('missing', { status: 404 }));

      await expect(client.requestData('core/update')).rejects.toBeInstanceOf(GatewayNotFoundError);
    });

    it('uses the body as the message of other failures', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(new Response('Gateway under maintenance', { status: 503 }));

      await expect(client.requestData('core/update')).rejects.toThrow(
        new GatewayBadResponseError('Gateway under maintenance'),
      );
    });

    it('falls back to a default message for an empty failure body', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(new Response('', { status: 500 }));

      await expect(client.requestData('core/update')).rejects.toThrow(
        'The update server returned an empty response.',
      );
    });

    it.each(['not json', 'false', '""', 'null'])('rejects the undecodable or empty body %s', async (body) => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(new Response(body, { status: 200 }));

      await expect(client.requestData('core/update')).rejects.toBeInstanceOf(GatewayInvalidResponseError);
    });

    it('refuses a payload whose signature does not verify', async () => {
      const client = await createClient();
      const response = signedResponse({ update: 1 });
      fetchSpy.mockResolvedValueOnce(
        new Response(JSON.stringify({ update: 5 }), { status: 200, headers: response.headers }),
      );

      await expect(client.requestData('core/update')).rejects.toBeInstanceOf(GatewayBadSignatureError);
    });

    it('refuses an unsigned payload', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(new Response(JSON.stringify({ update: 1 }), { status: 200 }));

      await expect(client.requestData('core/update')).rejects.toBeInstanceOf(GatewayBadSignatureError);
    });
  });

  // ============================================================================
  // requestFile
  // ============================================================================

  describe('requestFile', () => {
    it('names downloads after the md5 of the file code', async () => {
      const client = await createClient();
      expect(client.getFilePath('core')).toBe(join(tempPath, `${md5('core')}.arc`));
    });

    it('writes the body to the file path', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(new Response('archive-bytes', { status: 200 }));

      await client.requestFile('plugin/get', 'Acme.Blogabc', md5('archive-bytes'), { name: 'Acme.Blog' });

      expect(readFileSync(client.getFilePath('Acme.Blogabc'), 'utf8')).toBe('archive-bytes');
      expect(sentRequest().form.get('name')).toBe('Acme.Blog');
    });

    it('streams a chunked body to disk', async () => {
      const client = await createClient();
      const chunks = ['PK-part-1;', 'PK-part-2;', 'PK-part-3'];
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          for (const chunk of chunks) {
            controller.enqueue(Buffer.from(chunk));
          }
          controller.close();
        },
      });
      fetchSpy.mockResolvedValueOnce(new Response(body, { status: 200 }));

      await client.requestFile('core/get', 'core', md5(chunks.join('')));

      expect(readFileSync(client.getFilePath('core'), 'utf8')).toBe('PK-part-1;PK-part-2;PK-part-3');
    });

    it('truncates a previous download when the response has no body', async () => {
      const client = await createClient();
      writeFileSync(client.getFilePath('Acme.Emptyabc'), 'stale archive');
      fetchSpy.mockResolvedValueOnce(new Response(null, { status: 200 }));

      await client.requestFile('plugin/get', 'Acme.Emptyabc', '');

      expect(readFileSync(client.getFilePath('Acme.Emptyabc'), 'utf8')).toBe('');
    });

    it('follows one redirect with an unsigned GET', async () => {
      const client = await createClient({ UPDATE_AUTH: 'user:pass' });
      fetchSpy
        .mockResolvedValueOnce(new Response(null, { status: 302, headers: { location: 'https://cdn.test/files/core.zip' } }))
        .mockResolvedValueOnce(new Response('core-archive', { status: 200 }));

      await client.requestFile('core/get', 'core', '', { type: 'update' });

      expect(fetchSpy).toHaveBeenCalledTimes(2);
      const [redirectUrl, redirectInit] = fetchSpy.mock.calls[1];
      expect(String(redirectUrl)).toBe('https://cdn.test/files/core.zip');
      expect(redirectInit).toEqual({ method: 'GET', redirect: 'manual' });
      expect(readFileSync(client.getFilePath('core'), 'utf8')).toBe('core-archive');
    });

    it('resolves a relative redirect against the request url', async () => {
      const client = await createClient();
      fetchSpy
        .mockResolvedValueOnce(new Response(null, { status: 301, headers: { location: '/files/theme.zip' } }))
        .mockResolvedValueOnce(new Response('theme-archive', { status: 200 }));

      await client.requestFile('theme/get', 'Acme.Darkabc', '');

      expect(String(fetchSpy.mock.calls[1][0])).toBe('https://gateway.test/files/theme.zip');
    });

    it('reports the downloaded contents of a failed download', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(new Response('Plugin not licensed', { status: 403 }));

      await expect(client.requestFile('plugin/get', 'Acme.Shopxyz', '')).rejects.toThrow(
        new GatewayBadResponseError('Plugin not licensed'),
      );
    });

    it('removes an artifact whose hash does not match', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(new Response('tampered', { status: 200 }));

      await expect(
        client.requestFile('plugin/get', 'Acme.Blogdef', md5('original')),
      ).rejects.toBeInstanceOf(ArtifactHashMismatchError);
      expect(existsSync(client.getFilePath('Acme.Blogdef'))).toBe(false);
    });
  });

  // ============================================================================
  // CONVENIENCE ENDPOINTS
  // ============================================================================

  describe('convenience endpoints', () => {
    it('requests plugin details by name', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(signedResponse({ code: 'Acme.Blog', name: 'Blog' }));

      await expect(client.requestPluginDetails('Acme.Blog')).resolves.toEqual({ code: 'Acme.Blog', name: 'Blog' });
      expect(sentRequest().url).toBe('https://gateway.test/api/plugin/detail');
      expect(sentRequest().form.get('name')).toBe('Acme.Blog');
    });

    it('requests project details by id', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(signedResponse({ id: 'project-7', name: 'Storefront' }));

      await client.requestProjectDetails('project-7');

      expect(sentRequest().url).toBe('https://gateway.test/api/project/detail');
      expect(sentRequest().form.get('id')).toBe('project-7');
    });

    it('reads the changelog without verifying a signature', async () => {
      const client = await createClient();
      fetchSpy.mockResolvedValueOnce(new Response(JSON.stringify([{ version: '1.1.0' }]), { status: 200 }));

      await expect(client.requestChangelog()).resolves.toEqual([{ version: '1.1.0' }]);
    });
  });
});
