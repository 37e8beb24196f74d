import { z } from 'zod';

/**
 * Kitsu TypeScript types and Zod schemas
 * Every response body is parsed through these schemas before it reaches a caller
 */

// ---------- Enumerations ----------

export const AgeRatingSchema = z.enum(['G', 'PG', 'PG-13', 'R', 'R17', 'R17+', 'R18', 'R18+', 'TV-Y7']);

export type AgeRating = z.infer<typeof AgeRatingSchema>;

export const AnimeTypeSchema = z.enum(['movie', 'music', 'ONA', 'OVA', 'special', 'TV']);

export type AnimeType = z.infer<typeof AnimeTypeSchema>;

export const MangaTypeSchema = z.enum(['doujin', 'manga', 'manhua', 'novel', 'oneshot']);

export type MangaType = z.infer<typeof MangaTypeSchema>;

export const GenderSchema = z.enum(['female', 'male', 'secret']);

export type Gender = z.infer<typeof GenderSchema>;

export const WaifuOrHusbandoSchema = z.enum(['husbando', 'waifu']);

export type WaifuOrHusbando = z.infer<typeof WaifuOrHusbandoSchema>;

export const ResourceTypeSchema = z.enum(['anime', 'drama', 'manga', 'users']);

export type ResourceType = z.infer<typeof ResourceTypeSchema>;

export type AiringStatus = 'airing' | 'finished';

// ---------- Shared ----------

// Numeric on older API versions, string on edge
export const KitsuIdSchema = z.union([z.string(), z.number()]);

export type KitsuId = z.infer<typeof KitsuIdSchema>;

const LinksSchema = z.record(z.string(), z.string());

const RelationshipSchema = z.object({
  links: z.object({
    related: z.string(),
    self: z.string(),
  }),
});

export type Relationship = z.infer<typeof RelationshipSchema>;

export const ImageSchema = z.object({
  tiny: z.string().nullable().optional(),
  small: z.string().nullable().optional(),
  medium: z.string().nullable().optional(),
  large: z.string().nullable().optional(),
  original: z.string().nullable().optional(),
});

export type Image = z.infer<typeof ImageSchema>;

export const CoverImageSchema = z.object({
  small: z.string().nullable().optional(),
  large: z.string().nullable().optional(),
  original: z.string().nullable().optional(),
});

export type CoverImage = z.infer<typeof CoverImageSchema>;

const TitlesSchema = z.object({
  en: z.string().nullable().optional(),
  en_jp: z.string().nullable().optional(),
  ja_jp: z.string().nullable().optional(),
});

export type Titles = z.infer<typeof TitlesSchema>;

// Edge sends "82.47", older versions send 82.47
const AverageRatingSchema = z.union([
  z.number(),
  z
    .string()
    .regex(/^\d+(\.\d+)?$/)
    .transform(Number),
]);

const CountSchema = z.number().int().nonnegative();

// Keyed by rating bucket ("0.5", "4.0", "12", ...), counts may arrive as strings
export const RatingFrequenciesSchema = z.record(
  z.string(),
  z.union([
    CountSchema,
    z
      .string()
      .regex(/^\d+$/)
      .transform(Number),
  ]),
);

export type RatingFrequencies = z.infer<typeof RatingFrequenciesSchema>;

// ---------- Anime ----------

export const AnimeAttributesSchema = z.object({
  abbreviatedTitles: z.array(z.string()).default([]),
  ageRating: AgeRatingSchema.nullable().optional(),
  ageRatingGuide: z.string().nullable().optional(),
  averageRating: AverageRatingSchema.nullable().optional(),
  canonicalTitle: z.string(),
  coverImage: CoverImageSchema.nullable().optional(),
  coverImageTopOffset: z.number().int(),
  endDate: z.string().nullable().optional(),
  episodeCount: CountSchema.nullable().optional(),
  episodeLength: CountSchema.nullable().optional(),
  favoritesCount: CountSchema.nullable().optional(),
  showType: AnimeTypeSchema,
  nsfw: z.boolean(),
  popularityRank: CountSchema.nullable().optional(),
  posterImage: ImageSchema,
  ratingFrequencies: RatingFrequenciesSchema,
  ratingRank: CountSchema.nullable().optional(),
  slug: z.string(),
  startDate: z.string(),
  subtype: z.string().nullable().optional(),
  synopsis: z.string(),
  titles: TitlesSchema,
  userCount: CountSchema.nullable().optional(),
  youtubeVideoId: z.string().nullable().optional(),
});

export type AnimeAttributes = z.infer<typeof AnimeAttributesSchema>;

export const AnimeRelationshipsSchema = z.object({
  castings: RelationshipSchema.optional(),
  episodes: RelationshipSchema.optional(),
  genres: RelationshipSchema.optional(),
  installments: RelationshipSchema.optional(),
  mappings: RelationshipSchema.optional(),
  reviews: RelationshipSchema.optional(),
  streamingLinks: RelationshipSchema.optional(),
});

export type AnimeRelationships = z.infer<typeof AnimeRelationshipsSchema>;

export const AnimeSchema = z.object({
  id: KitsuIdSchema,
  type: ResourceTypeSchema,
  links: LinksSchema,
  attributes: AnimeAttributesSchema,
  relationships: AnimeRelationshipsSchema,
});

export type Anime = z.infer<typeof AnimeSchema>;

// ---------- Manga ----------

export const MangaAttributesSchema = z.object({
  abbreviatedTitles: z.array(z.string()).default([]),
  averageRating: AverageRatingSchema.nullable().optional(),
  canonicalTitle: z.string(),
  chapterCount: CountSchema.nullable().optional(),
  coverImage: CoverImageSchema.nullable().optional(),
  coverImageTopOffset: z.number().int(),
  endDate: z.string().nullable().optional(),
  mangaType: MangaTypeSchema,
  popularityRank: CountSchema.nullable().optional(),
  posterImage: ImageSchema,
  ratingFrequencies: RatingFrequenciesSchema,
  ratingRank: CountSchema.nullable().optional(),
  serialization: z.string().nullable().optional(),
  slug: z.string(),
  startDate: z.string().nullable().optional(),
  synopsis: z.string(),
  titles: TitlesSchema,
  volumeCount: CountSchema.nullable().optional(),
  youtubeVideoId: z.string().nullable().optional(),
});

export type MangaAttributes = z.infer<typeof MangaAttributesSchema>;

export const MangaRelationshipsSchema = z.object({
  castings: RelationshipSchema.optional(),
  chapters: RelationshipSchema.optional(),
  genres: RelationshipSchema.optional(),
  installments: RelationshipSchema.optional(),
  mappings: RelationshipSchema.optional(),
  reviews: RelationshipSchema.optional(),
});

export type MangaRelationships = z.infer<typeof MangaRelationshipsSchema>;

export const MangaSchema = z.object({
  id: KitsuIdSchema,
  type: ResourceTypeSchema,
  links: LinksSchema,
  attributes: MangaAttributesSchema,
  relationships: MangaRelationshipsSchema,
});

export type Manga = z.infer<typeof MangaSchema>;

// ---------- User ----------

export const UserAttributesSchema = z.object({
  about: z.string(),
  aboutFormatted: z.string().nullable().optional(),
  avatar: ImageSchema.nullable().optional(),
  bio: z.string(),
  birthday: z.string().nullable().optional(),
  commentsCount: CountSchema,
  coverImage: ImageSchema.nullable().optional(),
  createdAt: z.string(),
  facebookId: z.union([z.string(), z.number()]).nullable().optional(),
  favoritesCount: CountSchema,
  feedCompleted: z.boolean(),
  followersCount: CountSchema,
  followingCount: CountSchema,
  gender: GenderSchema.nullable().optional(),
  lifeSpentOnAnime: CountSchema,
  likesGivenCount: CountSchema,
  likesReceivedCount: CountSchema,
  location: z.string().nullable().optional(),
  name: z.string(),
  pastNames: z.array(z.string()),
  postsCount: CountSchema,
  profileCompleted: z.boolean(),
  proExpiresAt: z.string().nullable().optional(),
  ratingsCount: CountSchema,
  reviewsCount: CountSchema,
  title: z.string().nullable().optional(),
  updatedAt: z.string(),
  waifuOrHusbando: WaifuOrHusbandoSchema.nullable().optional(),
  website: z.string().nullable().optional(),
});

export type UserAttributes = z.infer<typeof UserAttributesSchema>;

export const UserRelationshipsSchema = z.object({
  blocks: RelationshipSchema.optional(),
  favorites: RelationshipSchema.optional(),
  followers: RelationshipSchema.optional(),
  following: RelationshipSchema.optional(),
  libraryEntries: RelationshipSchema.optional(),
  profileLinks: RelationshipSchema.optional(),
  mediaFollows: RelationshipSchema.optional(),
  pinnedPost: RelationshipSchema.optional(),
  reviews: RelationshipSchema.optional(),
  userRoles: RelationshipSchema.optional(),
  waifu: RelationshipSchema.optional(),
});

export type UserRelationships = z.infer<typeof UserRelationshipsSchema>;

export const UserSchema = z.object({
  id: KitsuIdSchema,
  type: ResourceTypeSchema,
  links: LinksSchema,
  attributes: UserAttributesSchema,
  relationships: UserRelationshipsSchema,
});

export type User = z.infer<typeof UserSchema>;

// ---------- Response Envelope ----------

/**
 * Wraps a payload schema in the JSON:API document shape.
 * `links` carries pagination (`first`, `next`, `last`) on collections.
 */
export function KitsuResponseSchema<T extends z.ZodType>(data: T) {
  return z.object({
    data,
    links: LinksSchema.default({}),
  });
}

export interface KitsuResponse<T> {
  data: T;
  links: Record<string, string>;
}

export const AnimeResponseSchema = KitsuResponseSchema(AnimeSchema);
export const AnimeCollectionSchema = KitsuResponseSchema(z.array(AnimeSchema));
export const MangaResponseSchema = KitsuResponseSchema(MangaSchema);
export const MangaCollectionSchema = KitsuResponseSchema(z.array(MangaSchema));
export const UserResponseSchema = KitsuResponseSchema(UserSchema);
export const UserCollectionSchema = KitsuResponseSchema(z.array(UserSchema));

// ---------- Error Types ----------

/**
 * A non-200 response as it came off the wire, kept for caller inspection
 */
export interface KitsuRawResponse {
  url: string;
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

export class KitsuError extends Error {
  constructor(
    message: string,
    public code?: string,
    public statusCode?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'KitsuError';
  }
}

export class KitsuBadRequestError extends KitsuError {
  constructor(public response: KitsuRawResponse) {
    super(`Bad request: ${response.url}`, 'BAD_REQUEST', 400);
    this.name = 'KitsuBadRequestError';
  }
}

export class KitsuUnauthorizedError extends KitsuError {
  constructor(public response: KitsuRawResponse) {
    super(`Unauthorized: ${response.url}`, 'UNAUTHORIZED', 401);
    this.name = 'KitsuUnauthorizedError';
  }
}

export class KitsuInvalidResponseError extends KitsuError {
  constructor(public response: KitsuRawResponse) {
    super(
      `Unexpected response status ${response.status}: ${response.url}`,
      'INVALID_RESPONSE',
      response.status,
    );
    this.name = 'KitsuInvalidResponseError';
  }
}

export class KitsuDecodeError extends KitsuError {
  constructor(
    message: string,
    public issues: z.ZodError['issues'] = [],
    options?: ErrorOptions,
  ) {
    super(message, 'DECODE_ERROR', undefined, options);
    this.name = 'KitsuDecodeError';
  }
}

export class KitsuUrlError extends KitsuError {
  constructor(
    public input: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid request URL: ${input}`, 'URL_ERROR', undefined, options);
    this.name = 'KitsuUrlError';
  }
}

export class KitsuTransportError extends KitsuError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'TRANSPORT_ERROR', undefined, options);
    this.name = 'KitsuTransportError';
  }
}
