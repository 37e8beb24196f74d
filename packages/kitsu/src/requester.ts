import { z } from 'zod';
import { kitsuConfig, type KitsuResourcePath } from './config/kitsu.config.js';
import { SearchQuery } from './search.js';
import type { KitsuTransport, TransportResponse } from './transports/types.js';
import {
  KitsuBadRequestError,
  KitsuDecodeError,
  KitsuError,
  KitsuInvalidResponseError,
  KitsuTransportError,
  KitsuUnauthorizedError,
  KitsuUrlError,
  type KitsuId,
  type KitsuRawResponse,
} from './types.js';
import { readText } from './utils/body.js';

export type KitsuLogger = Pick<Console, 'debug' | 'warn'>;

export interface KitsuRequesterOptions {
  baseUrl: string;
  headers: Record<string, string>;
  debug: boolean;
  logger: KitsuLogger;
}

/**
 * Request core shared by the buffered and streaming client surfaces:
 * URL building, the single GET, status mapping and schema decoding.
 */
export class KitsuRequester {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(
    private readonly transport: KitsuTransport,
    private readonly options: KitsuRequesterOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = mergeHeaders(kitsuConfig.headers, options.headers);
  }

  /**
   * `<base>/<resource>/<id>` for an id, `<base>/<resource>?<query>` otherwise
   */
  buildUrl(resource: KitsuResourcePath, target: KitsuId | SearchQuery = SearchQuery.create()): URL {
    const input =
      target instanceof SearchQuery
        ? `${this.baseUrl}/${resource}?${target.toString()}`
        : `${this.baseUrl}/${resource}/${target}`;

    try {
      return new URL(input);
    } catch (error) {
      throw new KitsuUrlError(input, { cause: error });
    }
  }

  /**
   * Issue the GET and map its status. Resolves with the live response on 200.
   */
  async open(url: URL): Promise<TransportResponse> {
    this.log(`🔎 GET ${url.href} (${this.transport.name})`);

    let response: TransportResponse;
    try {
      response = await this.transport.get(url, this.headers);
    } catch (error) {
      if (error instanceof KitsuError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new KitsuTransportError(`Request to ${url.href} failed: ${message}`, { cause: error });
    }

    this.log(`   ${response.status} ${response.statusText}`);

    if (response.status === 200) {
      return response;
    }

    const raw = await this.toRawResponse(url, response);
    if (this.options.debug) {
      this.options.logger.warn(`⚠️  Kitsu responded ${raw.status} for ${raw.url}`);
    }

    switch (response.status) {
      case 400:
        throw new KitsuBadRequestError(raw);
      case 401:
        throw new KitsuUnauthorizedError(raw);
      default:
        throw new KitsuInvalidResponseError(raw);
    }
  }

  /**
   * GET, then read and decode the whole body
   */
  async fetch<T>(url: URL, schema: z.ZodType<T>): Promise<T> {
    const response = await this.open(url);
    const text = await this.readBody(url, response.body);
    return this.decode(text, schema);
  }

  decode<T>(text: string, schema: z.ZodType<T>): T {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new KitsuDecodeError(`Response body is not valid JSON: ${message}`, [], { cause: error });
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      throw new KitsuDecodeError(
        `Response body does not match the expected shape:\n${z.prettifyError(result.error)}`,
        result.error.issues,
        { cause: result.error },
      );
    }

    return result.data;
  }

  async readBody(url: URL, body: AsyncIterable<Uint8Array>): Promise<string> {
    try {
      return await readText(body);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new KitsuTransportError(`Reading response from ${url.href} failed: ${message}`, {
        cause: error,
      });
    }
  }

  private async toRawResponse(url: URL, response: TransportResponse): Promise<KitsuRawResponse> {
    return {
      url: url.href,
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
      body: await this.readBody(url, response.body),
    };
  }

  private log(message: string): void {
    if (this.options.debug) {
      this.options.logger.debug(message);
    }
  }
}

// Header names are case-insensitive: a configured `accept` replaces the default `Accept`
function mergeHeaders(defaults: Record<string, string>, overrides: Record<string, string>): Record<string, string> {
  const merged: Record<string, string> = { ...defaults };
  for (const [name, value] of Object.entries(overrides)) {
    for (const existing of Object.keys(merged)) {
      if (existing.toLowerCase() === name.toLowerCase()) {
        delete merged[existing];
      }
    }
    merged[name] = value;
  }
  return merged;
}
