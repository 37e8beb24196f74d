import { describe, expect, test } from 'vitest';
import { loadFixture, withAttributes } from '../test/helpers.js';
import {
  AgeRatingSchema,
  AnimeCollectionSchema,
  AnimeSchema,
  KitsuInvalidResponseError,
  MangaSchema,
  UserResponseSchema,
  UserSchema,
} from './types.js';

describe('AnimeSchema', () => {
  test('decodes an edge anime resource', () => {
    const anime = AnimeSchema.parse(loadFixture('anime'));

    expect(anime.id).toBe('42');
    expect(anime.type).toBe('anime');
    expect(anime.attributes.canonicalTitle).toBe('Test Countryside Days');
    expect(anime.attributes.ageRating).toBe('G');
    expect(anime.attributes.showType).toBe('TV');
    expect(anime.attributes.averageRating).toBe(81.25);
    expect(anime.attributes.ratingFrequencies).toEqual({ '2': 1, '14': 20, '20': 57 });
    expect(anime.attributes.titles.ja_jp).toBeNull();
    expect(anime.relationships.genres?.links.related).toBe('https://kitsu.io/api/edge/anime/42/genres');
    expect(anime.relationships.castings).toBeUndefined();
  });

  test('accepts a numeric average rating', () => {
    const anime = AnimeSchema.parse(withAttributes(loadFixture('anime'), { averageRating: 64.5 }));

    expect(anime.attributes.averageRating).toBe(64.5);
  });

  test('rejects an age rating outside the known set', () => {
    const result = AnimeSchema.safeParse(withAttributes(loadFixture('anime'), { ageRating: 'NC-17' }));

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['attributes', 'ageRating']);
  });

  test('rejects an unknown show type', () => {
    const result = AnimeSchema.safeParse(withAttributes(loadFixture('anime'), { showType: 'podcast' }));

    expect(result.success).toBe(false);
  });

  test('survives an encode and decode cycle unchanged', () => {
    const anime = AnimeSchema.parse(loadFixture('anime'));
    const again = AnimeSchema.parse(JSON.parse(JSON.stringify(anime)));

    expect(again).toEqual(anime);
  });
});

describe('MangaSchema', () => {
  test('decodes nullable fields', () => {
    const manga = MangaSchema.parse(loadFixture('manga'));

    expect(manga.id).toBe('7');
    expect(manga.attributes.mangaType).toBe('manga');
    expect(manga.attributes.coverImage).toBeNull();
    expect(manga.attributes.endDate).toBeNull();
    expect(manga.attributes.titles.ja_jp).toBeUndefined();
    expect(manga.attributes.ratingFrequencies).toEqual({});
  });

  test('rejects an unknown manga type', () => {
    const result = MangaSchema.safeParse(withAttributes(loadFixture('manga'), { mangaType: 'webtoon' }));

    expect(result.success).toBe(false);
  });

  test('survives an encode and decode cycle unchanged', () => {
    const manga = MangaSchema.parse(loadFixture('manga'));

    expect(MangaSchema.parse(JSON.parse(JSON.stringify(manga)))).toEqual(manga);
  });
});

describe('UserSchema', () => {
  test('keeps a numeric id as a number', () => {
    const user = UserSchema.parse(loadFixture('user'));

    expect(user.id).toBe(1);
    expect(user.attributes.gender).toBe('secret');
    expect(user.attributes.waifuOrHusbando).toBe('waifu');
    expect(user.attributes.pastNames).toEqual(['old-tester']);
  });

  test('rejects an unknown waifu or husbando tag', () => {
    const result = UserSchema.safeParse(withAttributes(loadFixture('user'), { waifuOrHusbando: 'both' }));

    expect(result.success).toBe(false);
  });

  test('survives an encode and decode cycle unchanged', () => {
    const user = UserSchema.parse(loadFixture('user'));

    expect(UserSchema.parse(JSON.parse(JSON.stringify(user)))).toEqual(user);
  });
});

describe('envelopes', () => {
  test('defaults links to an empty record', () => {
    const response = UserResponseSchema.parse({ data: loadFixture('user') });

    expect(response.links).toEqual({});
    expect(response.data.attributes.name).toBe('tester');
  });

  test('keeps collection links and order', () => {
    const first = loadFixture('anime');
    const second = { ...first, id: '43' };
    const response = AnimeCollectionSchema.parse({
      data: [first, second],
      links: { next: 'https://kitsu.io/api/edge/anime?page[offset]=10' },
    });

    expect(response.data.map((anime) => anime.id)).toEqual(['42', '43']);
    expect(response.links.next).toBe('https://kitsu.io/api/edge/anime?page[offset]=10');
  });
});

describe('errors', () => {
  test('age ratings include the undocumented TV-Y7', () => {
    expect(AgeRatingSchema.parse('TV-Y7')).toBe('TV-Y7');
  });

  test('invalid response errors carry the status', () => {
    const error = new KitsuInvalidResponseError({
      url: 'https://kitsu.io/api/edge/anime/1',
      status: 503,
      statusText: 'Service Unavailable',
      headers: {},
      body: '',
    });

    expect(error.statusCode).toBe(503);
    expect(error.code).toBe('INVALID_RESPONSE');
    expect(error.message).toBe('Unexpected response status 503: https://kitsu.io/api/edge/anime/1');
  });
});
