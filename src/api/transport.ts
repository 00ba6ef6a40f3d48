import http from 'node:http';

import axios, { type AxiosInstance } from 'axios';

import { DEFAULT_TIMEOUT } from '../settings.js';
import type { HttpMethod } from './types.js';

export interface TransportRequest {
  method: HttpMethod;
  /** Path plus query string, already carrying the API key. */
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  /** Header names are lower-case. */
  headers: Record<string, string>;
  /** Raw bytes as received, still compressed if the server compressed them. */
  body: Buffer;
}

export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface HttpTransportOptions {
  timeout?: number;
}

function normalizeHeaders(headers: object): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      normalized[name.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      normalized[name.toLowerCase()] = value.join(', ');
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      normalized[name.toLowerCase()] = String(value);
    }
  }
  return normalized;
}

/**
 * Plain HTTP/1.1 to the NVR. Every call opens its own connection, the body is
 * handed back undecoded, and no status code makes it throw.
 */
export class HttpTransport implements Transport {
  private readonly http: AxiosInstance;

  constructor(host: string, port: number, options: HttpTransportOptions = {}) {
    this.http = axios.create({
      baseURL: `http://${host}:${port}`,
      timeout: options.timeout ?? DEFAULT_TIMEOUT,
      httpAgent: new http.Agent({ keepAlive: false }),
      responseType: 'arraybuffer',
      decompress: false,
      validateStatus: () => true,
      maxRedirects: 0,
      // The NVR sits on the local network; proxy variables must not reroute it.
      proxy: false,
    });
  }

  public async send(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.http.request<ArrayBuffer>({
      method: request.method,
      url: request.url,
      headers: request.headers,
      data: request.body,
    });

    return {
      status: response.status,
      statusText: response.statusText,
      headers: normalizeHeaders(response.headers),
      body: Buffer.from(response.data),
    };
  }
}
