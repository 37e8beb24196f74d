import { createInterface } from 'node:readline/promises';
import { KitsuClient, SearchQuery, describeAnime } from '@kitsu-kit/client';

const rl = createInterface({ input: process.stdin, output: process.stdout });
const name = (await rl.question('Enter an anime name to search for:\n> ')).trim();
rl.close();

const client = KitsuClient.create({ debug: process.argv.includes('--debug') });
const results = await client.searchAnime(SearchQuery.create().filter('text', name).limit(1));

const picked = results.data[0];
console.log(picked ? `Found Anime: ${describeAnime(picked)}` : 'No Anime Found.');
