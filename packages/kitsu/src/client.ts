import { z } from 'zod';
import { KitsuRequester, type KitsuLogger } from './requester.js';
import { SearchQuery } from './search.js';
import { KitsuStreamClient, type IKitsuStreamClient } from './stream.js';
import { FetchTransport } from './transports/fetch.js';
import type { KitsuTransport } from './transports/types.js';
import { kitsuConfig } from './config/kitsu.config.js';
import {
  AnimeCollectionSchema,
  AnimeResponseSchema,
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
 * Main Kitsu API client interface
 * Read-only, unauthenticated access to anime, manga and users
 */
export interface IKitsuClient {
  // Anime
  getAnime(id: KitsuId): Promise<Anime>;
  searchAnime(query?: SearchQuery): Promise<KitsuResponse<Anime[]>>;
  refreshAnime(anime: Anime): Promise<Anime>;

  // Manga
  getManga(id: KitsuId): Promise<Manga>;
  searchManga(query?: SearchQuery): Promise<KitsuResponse<Manga[]>>;
  refreshManga(manga: Manga): Promise<Manga>;

  // Users
  getUser(id: KitsuId): Promise<User>;
  searchUsers(query?: SearchQuery): Promise<KitsuResponse<User[]>>;
  refreshUser(user: User): Promise<User>;

  // Chunked bodies
  readonly stream: IKitsuStreamClient;
}

export const KitsuClientConfigSchema = z.object({
  baseUrl: z.string().default(kitsuConfig.apiUrl),
  headers: z.record(z.string(), z.string()).default({}),
  debug: z.boolean().default(false),
});

export type KitsuClientConfig = z.infer<typeof KitsuClientConfigSchema>;

export type KitsuClientOptions = z.input<typeof KitsuClientConfigSchema> & {
  transport?: KitsuTransport;
  logger?: KitsuLogger;
};

/**
 * Kitsu API client implementation
 *
 * @example
 * ```typescript
 * const client = KitsuClient.create()
 * const anime = await client.getAnime(1)
 * const results = await client.searchAnime(SearchQuery.create().filter('text', 'non non biyori'))
 * ```
 */
export class KitsuClient implements IKitsuClient {
  readonly stream: IKitsuStreamClient;
  readonly config: KitsuClientConfig;
  private readonly requester: KitsuRequester;

  private constructor(options: KitsuClientOptions) {
    const { transport, logger, ...rest } = options;
    this.config = KitsuClientConfigSchema.parse(rest);

    this.requester = new KitsuRequester(transport ?? new FetchTransport(), {
      ...this.config,
      logger: logger ?? console,
    });
    this.stream = new KitsuStreamClient(this.requester);
  }

  /**
   * Create a new Kitsu client instance
   * @param options Base URL, extra headers, transport and logging
   */
  static create(options: KitsuClientOptions = {}): KitsuClient {
    return new KitsuClient(options);
  }

  /**
   * Get a single anime
   * @param id Kitsu anime ID
   */
  async getAnime(id: KitsuId): Promise<Anime> {
    const response = await this.requester.fetch(this.requester.buildUrl('anime', id), AnimeResponseSchema);
    return response.data;
  }

  /**
   * Search anime
   * @param query Filters, sort and page; all anime when omitted
   */
  async searchAnime(query = SearchQuery.create()): Promise<KitsuResponse<Anime[]>> {
    return this.requester.fetch(this.requester.buildUrl('anime', query), AnimeCollectionSchema);
  }

  /**
   * Fetch a fresh copy of an anime already in hand
   */
  async refreshAnime(anime: Anime): Promise<Anime> {
    return this.getAnime(anime.id);
  }

  /**
   * Get a single manga
   * @param id Kitsu manga ID
   */
  async getManga(id: KitsuId): Promise<Manga> {
    const response = await this.requester.fetch(this.requester.buildUrl('manga', id), MangaResponseSchema);
    return response.data;
  }

  async searchManga(query = SearchQuery.create()): Promise<KitsuResponse<Manga[]>> {
    return this.requester.fetch(this.requester.buildUrl('manga', query), MangaCollectionSchema);
  }

  async refreshManga(manga: Manga): Promise<Manga> {
    return this.getManga(manga.id);
  }

  /**
   * Get a single user
   * @param id Kitsu user ID
   */
  async getUser(id: KitsuId): Promise<User> {
    const response = await this.requester.fetch(this.requester.buildUrl('users', id), UserResponseSchema);
    return response.data;
  }

  async searchUsers(query = SearchQuery.create()): Promise<KitsuResponse<User[]>> {
    return this.requester.fetch(this.requester.buildUrl('users', query), UserCollectionSchema);
  }

  async refreshUser(user: User): Promise<User> {
    return this.getUser(user.id);
  }
}
