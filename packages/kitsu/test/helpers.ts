import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { KitsuTransport, TransportResponse } from '../src/transports/types.js';

const JsonObjectSchema = z.record(z.string(), z.unknown());

export type JsonObject = z.infer<typeof JsonObjectSchema>;

export function loadFixture(name: 'anime' | 'manga' | 'user'): JsonObject {
  const raw = readFileSync(new URL(`./fixtures/${name}.json`, import.meta.url), 'utf8');
  return JsonObjectSchema.parse(JSON.parse(raw));
}

/**
 * Copy of a fixture resource with some attributes overridden
 */
export function withAttributes(resource: JsonObject, patch: JsonObject): JsonObject {
  const attributes = JsonObjectSchema.parse(resource.attributes);
  return { ...resource, attributes: { ...attributes, ...patch } };
}

export function envelope(data: unknown, links: Record<string, string> = {}): string {
  return JSON.stringify({ data, links });
}

export interface StubReply {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
  body?: string;
  chunks?: string[];
}

/**
 * In-process transport: records every request and answers with canned replies
 */
export class StubTransport implements KitsuTransport {
  readonly name = 'stub';
  readonly requests: Array<{ url: URL; headers: Record<string, string> }> = [];

  constructor(private readonly reply: StubReply | ((url: URL) => StubReply) = {}) {}

  async get(url: URL, headers: Record<string, string>): Promise<TransportResponse> {
    this.requests.push({ url, headers });
    const reply = typeof this.reply === 'function' ? this.reply(url) : this.reply;
    const encoder = new TextEncoder();
    const parts = reply.chunks ?? [reply.body ?? ''];

    return {
      status: reply.status ?? 200,
      statusText: reply.statusText ?? 'OK',
      headers: reply.headers ?? { 'content-type': 'application/vnd.api+json' },
      body: (async function* () {
        for (const part of parts) {
          yield encoder.encode(part);
        }
      })(),
    };
  }
}

export class FailingTransport implements KitsuTransport {
  readonly name = 'failing';

  constructor(private readonly error: unknown) {}

  async get(): Promise<TransportResponse> {
    throw this.error;
  }
}
