import { kitsuConfig } from '../config/kitsu.config.js';
import type { AiringStatus, Anime, CoverImage, Image, Manga, User } from '../types.js';

export function airingStatus(attributes: { endDate?: string | null }): AiringStatus {
  return attributes.endDate ? 'finished' : 'airing';
}

export function animeUrl(anime: Anime): string {
  return `${kitsuConfig.siteUrl}/anime/${anime.attributes.slug}`;
}

export function mangaUrl(manga: Manga): string {
  return `${kitsuConfig.siteUrl}/manga/${manga.attributes.slug}`;
}

export function userUrl(user: User): string {
  return `${kitsuConfig.siteUrl}/users/${user.attributes.name}`;
}

/**
 * Watch URL of the trailer, when the entry has one
 */
export function youtubeUrl(attributes: { youtubeVideoId?: string | null }): string | null {
  if (!attributes.youtubeVideoId) return null;
  return `${kitsuConfig.youtubeWatchUrl}?v=${attributes.youtubeVideoId}`;
}

/**
 * Pick the biggest available rendition: original, large, medium, small, tiny
 */
export function largestImage(image: Image | CoverImage | null | undefined): string | null {
  if (!image) return null;

  const candidates = [
    image.original,
    image.large,
    'medium' in image ? image.medium : undefined,
    image.small,
    'tiny' in image ? image.tiny : undefined,
  ];

  return candidates.find((candidate): candidate is string => typeof candidate === 'string') ?? null;
}

/**
 * One-line summary, e.g. `Non Non Biyori - 81.2`
 */
export function describeAnime(anime: Anime): string {
  const rating = anime.attributes.averageRating;
  return `${anime.attributes.canonicalTitle} - ${rating ?? '??'}`;
}
