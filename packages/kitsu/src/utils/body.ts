/**
 * Expose an already buffered payload as a one-chunk body
 */
export async function* singleChunk(bytes: Uint8Array): AsyncGenerator<Uint8Array> {
  if (bytes.byteLength > 0) {
    yield bytes;
  }
}

/**
 * Drain a chunked body into a UTF-8 string
 */
export async function readText(body: AsyncIterable<Uint8Array>): Promise<string> {
  const decoder = new TextDecoder();
  let text = '';

  for await (const chunk of body) {
    text += decoder.decode(chunk, { stream: true });
  }

  return text + decoder.decode();
}
