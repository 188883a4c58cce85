/**
 * Gateway Client
 *
 * Talks to the remote update gateway. Every request carries the protocol
 * version, client name and a fingerprint of this installation; when an API
 * key pair is configured the form body is signed. Every JSON response must
 * carry a valid gateway signature before it is handed back.
 */
import { Injectable, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import { createWriteStream } from 'fs';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  buildQueryString,
  createNonce,
  decodeJson,
  encodeBase64Json,
  GATEWAY,
  GATEWAY_PROTOCOL_VERSION,
  PARAMETER_KEYS,
  type JsonValue,
  type QueryParams,
} from '@tidewater/shared';
import {
  ArtifactHashMismatchError,
  GatewayBadResponseError,
  GatewayBadSignatureError,
  GatewayInvalidResponseError,
  GatewayNotFoundError,
} from '../common/errors';
import { parseFlag } from '../common/config.util';
import { ParametersService } from '../system/parameters.service';
import { InstalledUnitsService } from '../system/installed-units.service';
import { sign, verify } from './signature';
import { DEFAULT_GATEWAY_PUBLIC_KEY } from './gateway-key';

interface PreparedRequest {
  url: string;
  init: RequestInit;
}

const REDIRECT_STATUSES = [301, 302];

@Injectable()
export class GatewayClientService implements OnModuleInit {
  private readonly serverUrl: string;
  private readonly tempPath: string;
  private readonly publicKey: string;
  private readonly signatureAlgorithm: string;
  private readonly basicAuth: string | undefined;
  private readonly edgeUpdates: boolean;
  private readonly appUrl: string;
  private readonly appIp: string;
  private key: string | undefined;
  private secret: string | undefined;

  constructor(
    private readonly configService: ConfigService,
    private readonly parameters: ParametersService,
    private readonly installedUnits: InstalledUnitsService,
  ) {
    const serverUrl = this.configService.get<string>('UPDATE_SERVER_URL', GATEWAY.DEFAULT_URL);
    this.serverUrl = serverUrl.endsWith('/') ? serverUrl : `${serverUrl}/`;
    this.tempPath = this.configService.get<string>('TEMP_PATH', join(tmpdir(), 'tidewater'));
    this.publicKey = this.configService.get<string>('UPDATE_GATEWAY_KEY', DEFAULT_GATEWAY_PUBLIC_KEY);
    this.signatureAlgorithm = this.configService.get<string>(
      'UPDATE_GATEWAY_SIGNATURE_ALGORITHM',
      GATEWAY.DEFAULT_SIGNATURE_ALGORITHM,
    );
    this.basicAuth = this.configService.get<string>('UPDATE_AUTH');
    this.edgeUpdates = parseFlag(this.configService.get<string>('EDGE_UPDATES'), false);
    this.appUrl = this.configService.get<string>('APP_URL', 'http://localhost:3001');
    this.appIp = this.configService.get<string>('APP_IP', '127.0.0.1');
    this.key = this.configService.get<string>('UPDATE_API_KEY');
    this.secret = this.configService.get<string>('UPDATE_API_SECRET');
  }

  async onModuleInit(): Promise<void> {
    await mkdir(this.tempPath, { recursive: true });
  }

  /**
   * Sets the API key pair used to sign outbound requests
   */
  setSecurity(key: string, secret: string): void {
    this.key = key;
    this.secret = secret;
  }

  /**
   * Where the artifact for `fileCode` is downloaded to
   */
  getFilePath(fileCode: string): string {
    const name = createHash('md5').update(fileCode).digest('hex');
    return join(this.tempPath, `${name}${GATEWAY.ARCHIVE_EXTENSION}`);
  }

  /**
   * POSTs to a gateway endpoint and returns the verified JSON payload.
   */
  async requestData(endpoint: string, params: QueryParams = {}): Promise<JsonValue> {
    const { url, init } = await this.prepareRequest(endpoint, params);
    const response = await fetch(url, init);
    const body = await response.text();

    if (response.status === 404) {
      throw new GatewayNotFoundError();
    }

    if (response.status !== 200) {
      throw new GatewayBadResponseError(body);
    }

    const payload = this.decodePayload(body);
    const signature = response.headers.get(GATEWAY.SIGN_HEADER) ?? '';

    if (!verify(payload, signature, this.publicKey, this.signatureAlgorithm)) {
      throw new GatewayBadSignatureError();
    }

    return payload;
  }

  /**
   * Downloads an artifact to `getFilePath(fileCode)`. One redirect is
   * followed with a plain GET. When `expectedHash` is given the file's MD5
   * must match it.
   */
  async requestFile(
    endpoint: string,
    fileCode: string,
    expectedHash = '',
    params: QueryParams = {},
  ): Promise<void> {
    const filePath = this.getFilePath(fileCode);
    const { url, init } = await this.prepareRequest(endpoint, params);

    let response = await fetch(url, init);
    await this.writeBody(response, filePath);

    const location = response.headers.get('location');
    if (REDIRECT_STATUSES.includes(response.status) && location) {
      response = await fetch(new URL(location, url), { method: 'GET', redirect: 'manual' });
      await this.writeBody(response, filePath);
    }

    if (response.status !== 200) {
      throw new GatewayBadResponseError(await readFile(filePath, 'utf8'));
    }

    if (expectedHash) {
      const actualHash = createHash('md5').update(await readFile(filePath)).digest('hex');
      if (actualHash !== expectedHash.toLowerCase()) {
        await rm(filePath, { force: true });
        throw new ArtifactHashMismatchError(fileCode, expectedHash, actualHash);
      }
    }
  }

  async requestPluginDetails(code: string): Promise<JsonValue> {
    return this.requestData('plugin/detail', { name: code });
  }

  async requestPluginContent(code: string): Promise<JsonValue> {
    return this.requestData('plugin/content', { name: code });
  }

  async requestThemeDetails(code: string): Promise<JsonValue> {
    return this.requestData('theme/detail', { name: code });
  }

  async requestProjectDetails(projectId: string): Promise<JsonValue> {
    return this.requestData('project/detail', { id: projectId });
  }

  /**
   * Public changelog feed. Unsigned, so it is decoded but not verified.
   */
  async requestChangelog(): Promise<JsonValue> {
    const response = await fetch(GATEWAY.CHANGELOG_URL, { method: 'GET', redirect: 'manual' });
    const body = await response.text();

    if (response.status === 404) {
      throw new GatewayNotFoundError();
    }

    if (response.status !== 200) {
      throw new GatewayBadResponseError(body);
    }

    return this.decodePayload(body);
  }

  private async prepareRequest(endpoint: string, params: QueryParams): Promise<PreparedRequest> {
    const postData: QueryParams = {
      ...params,
      protocol_version: GATEWAY_PROTOCOL_VERSION,
      client: GATEWAY.CLIENT_NAME,
      server: await this.buildServerFingerprint(),
    };

    const projectId = await this.parameters.getString(PARAMETER_KEYS.PROJECT_ID);
    if (projectId) {
      postData.project = projectId;
    }

    if (this.edgeUpdates) {
      postData.edge = 1;
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
    };

    if (this.basicAuth) {
      headers.Authorization = `Basic ${Buffer.from(this.basicAuth).toString('base64')}`;
    }

    if (this.key && this.secret) {
      postData.nonce = createNonce();
      headers[GATEWAY.KEY_HEADER] = this.key;
      headers[GATEWAY.SIGN_HEADER] = sign(postData, this.secret);
    }

    return {
      url: `${this.serverUrl}${endpoint}`,
      init: {
        method: 'POST',
        headers,
        body: buildQueryString(postData),
        redirect: 'manual',
      },
    };
  }

  private async buildServerFingerprint(): Promise<string> {
    const since = await this.installedUnits.oldestInstallDate();
    return encodeBase64Json({
      runtime: process.version,
      url: this.appUrl,
      ip: this.appIp,
      since: since ? since.toISOString() : null,
    });
  }

  private decodePayload(body: string): JsonValue {
    let payload: JsonValue;
    try {
      payload = decodeJson(body);
    } catch (error) {
      throw new GatewayInvalidResponseError(undefined, { cause: error });
    }

    if (payload === false || payload === '' || payload === null) {
      throw new GatewayInvalidResponseError();
    }

    return payload;
  }

  /**
   * Streams the response body to `filePath`, truncating it when there is no body.
   */
  private async writeBody(response: Response, filePath: string): Promise<void> {
    if (!response.body) {
      await writeFile(filePath, '');
      return;
    }
    await pipeline(Readable.fromWeb(response.body), createWriteStream(filePath));
  }
}
