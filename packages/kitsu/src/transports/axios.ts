import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { Readable } from 'node:stream';
import type { KitsuTransport, TransportResponse } from './types.js';

/**
 * Streaming transport over axios.
 * Resolves as soon as the status line arrives; the body is yielded chunk by
 * chunk as the socket delivers it. The given instance is used as is.
 */
export class AxiosTransport implements KitsuTransport {
  readonly name = 'axios';

  constructor(private readonly http: AxiosInstance = axios.create()) {}

  async get(url: URL, headers: Record<string, string>): Promise<TransportResponse> {
    const response = await this.http.get<Readable>(url.href, {
      headers,
      responseType: 'stream',
      // Status mapping belongs to the requester
      validateStatus: () => true,
    });

    return {
      status: response.status,
      statusText: response.statusText,
      headers: flattenHeaders(response.headers),
      body: chunks(response.data),
    };
  }
}

async function* chunks(stream: Readable): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();

  for await (const chunk of stream) {
    const value: unknown = chunk;
    if (value instanceof Uint8Array) {
      yield value;
    } else if (typeof value === 'string') {
      yield encoder.encode(value);
    }
  }
}

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      flat[key.toLowerCase()] = value.join(', ');
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      flat[key.toLowerCase()] = String(value);
    }
  }

  return flat;
}
