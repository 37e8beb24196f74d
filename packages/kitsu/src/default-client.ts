import { KitsuClient } from './client.js';
import type { SearchQuery } from './search.js';
import type { Anime, KitsuId, KitsuResponse, Manga, User } from './types.js';

let defaultClient: KitsuClient | null = null;

/**
 * Shared client behind the module-level shortcuts, created on first use
 */
export function getDefaultClient(): KitsuClient {
  if (!defaultClient) {
    defaultClient = KitsuClient.create();
  }
  return defaultClient;
}

export function setDefaultClient(client: KitsuClient | null): void {
  defaultClient = client;
}

export function getAnime(id: KitsuId): Promise<Anime> {
  return getDefaultClient().getAnime(id);
}

export function getManga(id: KitsuId): Promise<Manga> {
  return getDefaultClient().getManga(id);
}

export function getUser(id: KitsuId): Promise<User> {
  return getDefaultClient().getUser(id);
}

export function searchAnime(query?: SearchQuery): Promise<KitsuResponse<Anime[]>> {
  return getDefaultClient().searchAnime(query);
}

export function searchManga(query?: SearchQuery): Promise<KitsuResponse<Manga[]>> {
  return getDefaultClient().searchManga(query);
}

export function searchUsers(query?: SearchQuery): Promise<KitsuResponse<User[]>> {
  return getDefaultClient().searchUsers(query);
}
