import type { EntitySet } from '../entity-set.js';
import type { Entity } from '../entity.js';
import type { RawResponse, ResultOptions } from '../types.js';
import { PaginationLimitError } from '../errors.js';
import { readNextLink } from './next-link.js';
import type { CompiledQuery } from './types.js';

export const DEFAULT_MAX_PAGE_FETCHES = 100;

export function resolveMaxPageFetches(value: number | undefined): number {
  const limit = value ?? DEFAULT_MAX_PAGE_FETCHES;
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`maxPageFetches must be a non-negative integer, got ${limit}`);
  }
  return limit;
}

/**
 * Entities returned by one execution of a query. Iterating yields the
 * entities of the first page, then follows the server's continuation
 * links one page at a time.
 *
 * Every `for await` starts over from the first page held here;
 * continuation pages are fetched again on each pass.
 */
export class Result implements AsyncIterable<Entity> {
  private readonly maxPageFetches: number;

  constructor(
    private readonly entitySet: EntitySet,
    readonly query: CompiledQuery,
    private readonly firstPage: RawResponse,
    options: ResultOptions = {},
  ) {
    this.maxPageFetches = resolveMaxPageFetches(options.maxPageFetches);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Entity> {
    const { service, parser, entityOptions, logger } = this.entitySet;
    let page = this.firstPage;
    // URL the held page was fetched from; the first page has none.
    let pageUrl: string | undefined;
    let fetches = 0;

    while (true) {
      const next = readNextLink(page.body, service.serviceUrl);

      for (const entity of parser.parse(page.body, entityOptions)) {
        yield entity;
      }

      // A page advertising the link it was fetched from is the last one.
      if (next === undefined || next === pageUrl) return;

      if (fetches >= this.maxPageFetches) {
        logger.error({ limit: this.maxPageFetches, next }, 'pagination limit exceeded');
        throw new PaginationLimitError(this.maxPageFetches, next);
      }

      logger.debug({ next, fetch: fetches + 1 }, 'fetching continuation page');
      page = await service.execute(next, {}, true);
      pageUrl = next;
      fetches += 1;
    }
  }

  /** Drains every page into an array. */
  async toArray(): Promise<Entity[]> {
    const entities: Entity[] = [];
    for await (const entity of this) {
      entities.push(entity);
    }
    return entities;
  }
}
