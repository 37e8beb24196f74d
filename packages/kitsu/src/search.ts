/**
 * Search query builder
 *
 * Accumulates filter, sort and page parameters and renders them as
 * `&key=value` segments, in the order they were added. Keys are not
 * validated, repeated keys are all kept and values are not percent-encoded:
 * callers pass URL-safe values.
 *
 * @example
 * ```typescript
 * const query = SearchQuery.create().filter('text', 'non non biyori').limit(5).sort('-id')
 * query.toString() // '&filter[text]=non non biyori&page[limit]=5&sort=-id'
 * ```
 */
export class SearchQuery {
  private readonly params: ReadonlyArray<readonly [string, string]>;

  constructor(params: ReadonlyArray<readonly [string, string]> = []) {
    this.params = params;
  }

  static create(): SearchQuery {
    return new SearchQuery();
  }

  /**
   * Filter results by an attribute, e.g. `filter('text', 'cowboy bebop')`
   */
  filter(key: string, value: string): SearchQuery {
    return this.append(`filter[${key}]`, value);
  }

  /**
   * Maximum number of results per page. Pairs with {@link offset}.
   */
  limit(limit: number): SearchQuery {
    return this.append('page[limit]', String(limit));
  }

  /**
   * Number of results to skip. Pairs with {@link limit}.
   */
  offset(offset: number): SearchQuery {
    return this.append('page[offset]', String(offset));
  }

  /**
   * Sort by one or more fields: `id` ascending, `-id` descending,
   * several joined with a comma.
   */
  sort(sort: string): SearchQuery {
    return this.append('sort', sort);
  }

  entries(): Array<[string, string]> {
    return this.params.map(([key, value]) => [key, value]);
  }

  isEmpty(): boolean {
    return this.params.length === 0;
  }

  toString(): string {
    return this.params.map(([key, value]) => `&${key}=${value}`).join('');
  }

  private append(key: string, value: string): SearchQuery {
    return new SearchQuery([...this.params, [key, value]]);
  }
}
