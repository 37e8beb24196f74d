import type { z } from 'zod';
import type { KitsuRequester } from './requester.js';
import { SearchQuery } from './search.js';
import type { TransportResponse } from './transports/types.js';
import {
  AnimeCollectionSchema,
  AnimeResponseSchema,
  KitsuError,
  MangaCollectionSchema,
  MangaResponseSchema,
  UserCollectionSchema,
  UserResponseSchema,
  type Anime,
  type KitsuId,
  type KitsuResponse,
  type Manga,
  type User,
} from './types.js';

/**
 * A 200 response whose body has not been read yet.
 *
 * Iterate it for raw chunks, or call `json()` to decode it into the typed
 * envelope. Either way the body can only be consumed once.
 */
export class KitsuResponseStream<T> implements AsyncIterable<Uint8Array> {
  private consumed = false;

  constructor(
    readonly url: URL,
    private readonly response: TransportResponse,
    private readonly requester: KitsuRequester,
    private readonly schema: z.ZodType<KitsuResponse<T>>,
  ) {}

  get status(): number {
    return this.response.status;
  }

  get headers(): Record<string, string> {
    return this.response.headers;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    yield* this.take();
  }

  async json(): Promise<KitsuResponse<T>> {
    const text = await this.requester.readBody(this.url, this.take());
    return this.requester.decode(text, this.schema);
  }

  private take(): AsyncIterable<Uint8Array> {
    if (this.consumed) {
      throw new KitsuError(`Response body of ${this.url.href} was already consumed`, 'BODY_CONSUMED');
    }
    this.consumed = true;
    return this.response.body;
  }
}

export interface IKitsuStreamClient {
  getAnime(id: KitsuId): Promise<KitsuResponseStream<Anime>>;
  getManga(id: KitsuId): Promise<KitsuResponseStream<Manga>>;
  getUser(id: KitsuId): Promise<KitsuResponseStream<User>>;
  searchAnime(query?: SearchQuery): Promise<KitsuResponseStream<Anime[]>>;
  searchManga(query?: SearchQuery): Promise<KitsuResponseStream<Manga[]>>;
  searchUsers(query?: SearchQuery): Promise<KitsuResponseStream<User[]>>;
}

/**
 * Deferred surface of the client: resolves once the status is mapped and
 * leaves the body to the caller.
 */
export class KitsuStreamClient implements IKitsuStreamClient {
  constructor(private readonly requester: KitsuRequester) {}

  async getAnime(id: KitsuId): Promise<KitsuResponseStream<Anime>> {
    return this.open<Anime>(this.requester.buildUrl('anime', id), AnimeResponseSchema);
  }

  async getManga(id: KitsuId): Promise<KitsuResponseStream<Manga>> {
    return this.open<Manga>(this.requester.buildUrl('manga', id), MangaResponseSchema);
  }

  async getUser(id: KitsuId): Promise<KitsuResponseStream<User>> {
    return this.open<User>(this.requester.buildUrl('users', id), UserResponseSchema);
  }

  async searchAnime(query = SearchQuery.create()): Promise<KitsuResponseStream<Anime[]>> {
    return this.open<Anime[]>(this.requester.buildUrl('anime', query), AnimeCollectionSchema);
  }

  async searchManga(query = SearchQuery.create()): Promise<KitsuResponseStream<Manga[]>> {
    return this.open<Manga[]>(this.requester.buildUrl('manga', query), MangaCollectionSchema);
  }

  async searchUsers(query = SearchQuery.create()): Promise<KitsuResponseStream<User[]>> {
    return this.open<User[]>(this.requester.buildUrl('users', query), UserCollectionSchema);
  }

  private async open<T>(url: URL, schema: z.ZodType<KitsuResponse<T>>): Promise<KitsuResponseStream<T>> {
    const response = await this.requester.open(url);
    return new KitsuResponseStream(url, response, this.requester, schema);
  }
}
