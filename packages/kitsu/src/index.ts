/**
 * @kitsu-kit/client - Kitsu API client
 *
 * Typed access to anime, manga and users, with a search query builder and
 * buffered or streaming transports.
 *
 * @example
 * ```typescript
 * import { KitsuClient, SearchQuery, describeAnime } from '@kitsu-kit/client'
 *
 * const client = KitsuClient.create()
 * const results = await client.searchAnime(SearchQuery.create().filter('text', 'non non biyori'))
 * console.log(results.data.map(describeAnime))
 *
 * // Chunked body over axios
 * const streaming = KitsuClient.create({ transport: new AxiosTransport() })
 * const stream = await streaming.stream.getAnime(1)
 * for await (const chunk of stream) process.stdout.write(chunk)
 * ```
 */

export {
  KitsuClient,
  KitsuClientConfigSchema,
  type IKitsuClient,
  type KitsuClientConfig,
  type KitsuClientOptions,
} from './client.js';
export { KitsuRequester, type KitsuLogger, type KitsuRequesterOptions } from './requester.js';
export { KitsuResponseStream, KitsuStreamClient, type IKitsuStreamClient } from './stream.js';
export { SearchQuery } from './search.js';
export { FetchTransport, type FetchLike } from './transports/fetch.js';
export { AxiosTransport } from './transports/axios.js';
export type { KitsuTransport, TransportResponse } from './transports/types.js';
export * from './types.js';
export * from './utils/media.js';
export * from './default-client.js';
export { kitsuConfig, type KitsuConfig, type KitsuResourcePath } from './config/kitsu.config.js';
