import { afterEach, describe, expect, test } from 'vitest';
import { envelope, loadFixture, StubTransport } from '../test/helpers.js';
import { KitsuClient } from './client.js';
import { getAnime, getDefaultClient, searchUsers, setDefaultClient } from './default-client.js';
import { SearchQuery } from './search.js';

describe('default client', () => {
  afterEach(() => {
    setDefaultClient(null);
  });

  test('is created once and reused', () => {
    const first = getDefaultClient();

    expect(getDefaultClient()).toBe(first);
    expect(first.config.baseUrl).toBe('https://kitsu.io/api/edge');
  });

  test('shortcuts forward to the configured client', async () => {
    const transport = new StubTransport((url) =>
      url.pathname.endsWith('/users')
        ? { body: envelope([loadFixture('user')]) }
        : { body: envelope(loadFixture('anime')) },
    );
    setDefaultClient(KitsuClient.create({ transport }));

    const anime = await getAnime(42);
    const users = await searchUsers(SearchQuery.create().filter('name', 'tester'));

    expect(anime.id).toBe('42');
    expect(users.data[0]?.attributes.name).toBe('tester');
    expect(transport.requests.map((request) => request.url.href)).toEqual([
      'https://kitsu.io/api/edge/anime/42',
      'https://kitsu.io/api/edge/users?&filter[name]=tester',
    ]);
  });
});
