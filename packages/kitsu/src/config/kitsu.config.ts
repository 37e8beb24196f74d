/**
 * Kitsu API configuration
 * Static endpoints and defaults shared by the client, transports and helpers
 */

export const kitsuConfig = {
  name: 'Kitsu',
  apiUrl: 'https://kitsu.io/api/edge',
  siteUrl: 'https://kitsu.io',
  youtubeWatchUrl: 'https://www.youtube.com/watch',

  // Collection paths under apiUrl
  paths: {
    anime: 'anime',
    manga: 'manga',
    users: 'users',
  },

  // JSON:API media type
  headers: {
    Accept: 'application/vnd.api+json',
  },
} as const;

export type KitsuConfig = typeof kitsuConfig;
export type KitsuResourcePath = (typeof kitsuConfig.paths)[keyof typeof kitsuConfig.paths];
