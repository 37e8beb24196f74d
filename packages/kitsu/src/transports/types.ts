/**
 * A response whose status line has arrived; the body may still be in flight
 */
export interface TransportResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: AsyncIterable<Uint8Array>;
}

/**
 * Performs one GET. Implementations must not retry, and must reject only
 * for transport failures: every HTTP status is a resolved response.
 */
export interface KitsuTransport {
  readonly name: string;
  get(url: URL, headers: Record<string, string>): Promise<TransportResponse>;
}
