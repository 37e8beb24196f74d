import { createInterface } from 'node:readline/promises';
import { AxiosTransport, KitsuClient } from '@kitsu-kit/client';

const rl = createInterface({ input: process.stdin, output: process.stdout });
const id = (await rl.question('Enter an anime id to fetch:\n> ')).trim();
rl.close();

const client = KitsuClient.create({ transport: new AxiosTransport() });
const stream = await client.stream.getAnime(id);

for await (const chunk of stream) {
  process.stdout.write(chunk);
}
process.stdout.write('\n');
console.log('Done');
