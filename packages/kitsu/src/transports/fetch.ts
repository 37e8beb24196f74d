import type { KitsuTransport, TransportResponse } from './types.js';
import { singleChunk } from '../utils/body.js';

export type FetchLike = (input: URL, init: { method: 'GET'; headers: Record<string, string> }) => Promise<Response>;

/**
 * Buffered transport over `fetch`.
 * The whole body is read before the response is handed back.
 */
export class FetchTransport implements KitsuTransport {
  readonly name = 'fetch';

  constructor(private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)) {}

  async get(url: URL, headers: Record<string, string>): Promise<TransportResponse> {
    const response = await this.fetchImpl(url, { method: 'GET', headers });
    const payload = new Uint8Array(await response.arrayBuffer());

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key] = value;
    });

    return {
      status: response.status,
      statusText: response.statusText,
      headers: responseHeaders,
      body: singleChunk(payload),
    };
  }
}
