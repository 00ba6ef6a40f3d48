import { isDeepStrictEqual } from 'node:util';
import { unzipSync } from 'node:zlib';

import { createLogger } from '../logger.js';
import type { ClientLogger } from '../logger.js';
import { CAMERA_API_PATH, DEFAULT_PATH, DEFAULT_PORT } from '../settings.js';
import type { ConnectionConfig } from '../settings.js';
import { ConfigurationError, UvcApiError, UvcResponseError } from './errors.js';
import { applyPictureSettings } from './picture.js';
import {
  decodeCameraRecord,
  decodeCameraSummary,
  decodeEnvelope,
  encodeCameraRecord,
  encodeRecordingSettings,
  firstEntry,
  readIspSettings,
  readRecordingSettings,
} from './records.js';
import { channelIndex, recordingFlags } from './recording.js';
import { HttpTransport } from './transport.js';
import type { Transport, TransportResponse } from './transport.js';
import type {
  CameraRecord,
  CameraSummary,
  HttpMethod,
  IspSettings,
  JsonObject,
  PictureSettingInput,
  UvcResult,
} from './types.js';

const ACCEPT = 'application/json, text/javascript, */*; q=0.01';
const ACCEPT_ENCODING = 'gzip, deflate';
const COMPRESSED_ENCODINGS = ['gzip', 'deflate'];

export interface OutputSink {
  write(text: string): unknown;
}

export interface UvcClientOptions {
  log?: ClientLogger;
  transport?: Transport;
  /** Request timeout in milliseconds for the built-in transport. */
  timeout?: number;
  /** Where {@link UvcClient.dump} writes. Defaults to stdout. */
  output?: OutputSink;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function headerValue(headers: Record<string, string>, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) {
      return value;
    }
  }
  return undefined;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class UvcClient {
  public readonly host: string;
  public readonly port: number;
  public readonly path: string;

  private readonly apiKey: string;
  private readonly log: ClientLogger;
  private readonly transport: Transport;
  private readonly output: OutputSink;

  constructor(connection: ConnectionConfig, options: UvcClientOptions = {}) {
    this.host = connection.host;
    this.port = connection.port ?? DEFAULT_PORT;
    this.path = connection.path ?? DEFAULT_PATH;
    if (this.path !== DEFAULT_PATH) {
      throw new ConfigurationError('Path not supported yet');
    }
    this.apiKey = connection.apiKey;

    this.log = options.log ?? createLogger(this.host, this.port);
    this.transport = options.transport ?? new HttpTransport(this.host, this.port, { timeout: options.timeout });
    this.output = options.output ?? process.stdout;
  }

  /**
   * Sends one authenticated request and decodes the JSON reply. Never throws:
   * status, transport and decoding failures come back as `ok: false`.
   */
  public async request(
    path: string,
    method: HttpMethod = 'GET',
    body?: string,
    mimetype = 'application/json',
  ): Promise<UvcResult<unknown>> {
    const separator = path.includes('?') ? '&' : '?';
    const url = `${path}${separator}apiKey=${encodeURIComponent(this.apiKey)}`;
    const headers = {
      'Content-Type': mimetype,
      Accept: ACCEPT,
      'Accept-Encoding': ACCEPT_ENCODING,
    };

    this.log.debug(`${method} ${path}`);

    let response: TransportResponse;
    try {
      response = await this.transport.send({ method, url, headers, body });
    } catch (error) {
      this.log.error(`${method} ${path} failed: ${describeError(error)}`);
      return {
        ok: false,
        error: new UvcApiError(`Error requesting ${method} ${path} from ${this.host}:${this.port}: ${describeError(error)}`),
      };
    }

    this.log.debug(`${method} ${path} -> ${response.status} ${response.statusText}`);

    const text = this.readBody(response);

    if (!isSuccess(response.status)) {
      this.log.warn(`${method} ${path} returned ${response.status} ${response.statusText}`);
      return {
        ok: false,
        error: new UvcApiError(
          `${method} ${path} failed with status ${response.status}`,
          response.status,
          text.ok ? text.value : undefined,
        ),
      };
    }

    if (!text.ok) {
      return text;
    }

    try {
      const value: unknown = JSON.parse(text.value);
      return { ok: true, value };
    } catch (error) {
      return {
        ok: false,
        error: new UvcResponseError(`${method} ${path} returned invalid JSON: ${describeError(error)}`),
      };
    }
  }

  /** Pretty-prints the raw record of one camera. */
  public async dump(id: string): Promise<void> {
    const body = await this.call(this.cameraPath(id));
    this.output.write(`${JSON.stringify(body, null, 2)}\n`);
  }

  public async getCamera(id: string): Promise<CameraRecord> {
    return decodeCameraRecord(firstEntry(await this.call(this.cameraPath(id))));
  }

  /**
   * Switches a camera between never, always and motion-triggered recording,
   * optionally moving it to another channel.
   *
   * @param mode - `none`, `full` or `motion`, in any case
   * @param channel - `high`, `medium` or `low`
   * @returns whether the NVR stored exactly the settings that were sent
   */
  public async setRecordMode(id: string, mode: string, channel?: string): Promise<boolean> {
    const flags = recordingFlags(mode);
    const channelNumber = channel ? channelIndex(channel) : undefined;

    const record = await this.getCamera(id);
    record.recordingSettings = { ...record.recordingSettings, ...flags };
    if (channelNumber !== undefined) {
      record.recordingSettings.channel = channelNumber;
    }

    const sent = encodeRecordingSettings(record.recordingSettings);
    const updated = readRecordingSettings(await this.putCamera(id, record));

    if (!isDeepStrictEqual(sent, updated)) {
      this.log.warn(`NVR stored different recording settings for camera ${id}`);
      return false;
    }

    this.log.info(`Recording mode for camera ${id} set to ${mode.toLowerCase()}`);
    return true;
  }

  public async getPictureSettings(id: string): Promise<IspSettings> {
    const record = await this.getCamera(id);
    return record.ispSettings;
  }

  /**
   * Updates ISP settings, converting each value to the type the camera
   * already stores for that key. Unknown keys and unconvertible values fail
   * before anything is written.
   *
   * @returns the ISP settings the NVR reports after the update
   */
  public async setPictureSettings(
    id: string,
    settings: Readonly<Record<string, PictureSettingInput>>,
  ): Promise<IspSettings> {
    const record = await this.getCamera(id);
    record.ispSettings = applyPictureSettings(record.ispSettings, settings);

    const updated = readIspSettings(await this.putCamera(id, record));
    this.log.info(`Picture settings updated for camera ${id}: ${Object.keys(settings).join(', ')}`);
    return updated;
  }

  public async index(): Promise<CameraSummary[]> {
    const entries = decodeEnvelope(await this.call(CAMERA_API_PATH));
    return entries.map(entry => decodeCameraSummary(entry));
  }

  /**
   * @returns the uuid of the camera with this name, or null. When names
   * repeat, the camera listed last wins.
   */
  public async nameToUuid(name: string): Promise<string | null> {
    const byName = new Map<string, string>();
    for (const camera of await this.index()) {
      byName.set(camera.name, camera.uuid);
    }
    return byName.get(name) ?? null;
  }

  private cameraPath(id: string): string {
    return `${CAMERA_API_PATH}/${encodeURIComponent(id)}`;
  }

  private async call(path: string, method: HttpMethod = 'GET', body?: string): Promise<unknown> {
    const result = await this.request(path, method, body);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  private async putCamera(id: string, record: CameraRecord): Promise<JsonObject> {
    const body = JSON.stringify(encodeCameraRecord(record));
    return firstEntry(await this.call(this.cameraPath(id), 'PUT', body));
  }

  private readBody(response: TransportResponse): UvcResult<string> {
    const encoding = headerValue(response.headers, 'content-encoding')?.trim().toLowerCase();
    if (!encoding || !COMPRESSED_ENCODINGS.includes(encoding)) {
      return { ok: true, value: response.body.toString('utf8') };
    }

    try {
      return { ok: true, value: unzipSync(response.body).toString('utf8') };
    } catch (error) {
      return {
        ok: false,
        error: new UvcResponseError(`Could not decompress ${encoding} response: ${describeError(error)}`),
      };
    }
  }
}
