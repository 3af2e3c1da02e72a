import type { EntitySet } from '../entity-set.js';
import type { ResultOptions } from '../types.js';
import { ResponseFormatError } from '../errors.js';
import { Criteria, CriteriaBuilder } from './criteria.js';
import { compileCountPath, compileCountRequestPath, compileQuery } from './compiler.js';
import { Result } from './result.js';
import type { CompiledQuery, CriteriaExpression, FilterOperand } from './types.js';

function toPagingValue(method: string, value: number): number {
  const n = Math.trunc(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new RangeError(`Query.${method}: expected a non-negative integer, got ${value}`);
  }
  return n;
}

/**
 * Fluent criteria builder scoped to one entity set. Builder methods
 * mutate this instance and return it; compile() takes an immutable
 * snapshot that execute(), count() and toString() work from.
 *
 * @example
 * const q = products.query();
 * q.where(q.property('Name').eq('Bread'))
 *   .where(q.property('Price').gt(10))
 *   .orderBy('Price desc')
 *   .limit(5);
 * q.toString(); // Products?$filter=Name eq 'Bread' and Price gt 10&$orderby=Price desc&$top=5
 */
export class Query {
  private readonly filters: CriteriaExpression[] = [];
  private readonly orderTokens: string[] = [];
  private readonly expandTokens: string[] = [];
  private readonly selectTokens: string[] = [];
  private skipValue = 0;
  private topValue = 0;
  private inlineCount = false;
  private search: string | null = null;

  constructor(readonly entitySet: EntitySet) {}

  /**
   * Starts a comparison on the named property. Names the entity type
   * does not declare are kept as raw operands. Does not modify the query.
   */
  property(name: string): CriteriaBuilder {
    const property = this.entitySet.newEntity().getProperty(name);
    const operand: FilterOperand = property !== undefined
      ? { kind: 'property', property }
      : { kind: 'raw', name };
    return new CriteriaBuilder(operand);
  }

  /** Adds a filter; successive filters are joined with `and`. */
  where(criteria: Criteria): this {
    this.filters.push(criteria);
    return this;
  }

  /** Tokens may carry a direction, e.g. `Name desc`. */
  orderBy(...properties: string[]): this {
    this.orderTokens.push(...properties);
    return this;
  }

  expand(...associations: string[]): this {
    this.expandTokens.push(...associations);
    return this;
  }

  select(...properties: string[]): this {
    this.selectTokens.push(...properties);
    return this;
  }

  skip(value: number): this {
    this.skipValue = toPagingValue('skip', value);
    return this;
  }

  limit(value: number): this {
    this.topValue = toPagingValue('limit', value);
    return this;
  }

  searchTerm(value: string): this {
    this.search = value;
    return this;
  }

  includeCount(): this {
    this.inlineCount = true;
    return this;
  }

  compile(): CompiledQuery {
    return compileQuery(this.entitySet.name, {
      filter: this.filters,
      searchTerm: this.search,
      orderby: this.orderTokens,
      expand: this.expandTokens,
      select: this.selectTokens,
      inlineCount: this.inlineCount,
      skip: this.skipValue,
      top: this.topValue,
    });
  }

  toString(): string {
    return this.compile().path;
  }

  async execute(options: ResultOptions = {}): Promise<Result> {
    const compiled = this.compile();
    this.entitySet.logger.debug({ path: compiled.path }, 'executing query');
    const response = await this.entitySet.service.execute(compiled.requestPath, {}, true);
    return new Result(this.entitySet, compiled, response, {
      maxPageFetches: options.maxPageFetches ?? this.entitySet.maxPageFetches,
    });
  }

  /** Number of entities matching the current criteria, via `$count`. */
  async count(): Promise<number> {
    const compiled = this.compile();
    const path = compileCountPath(compiled);
    const response = await this.entitySet.service.execute(compileCountRequestPath(compiled), {}, true);
    const body = response.body.trim();
    if (!/^\d+$/.test(body)) {
      throw new ResponseFormatError(`Expected an integer count from ${path}, got "${body}"`);
    }
    return Number.parseInt(body, 10);
  }

  async isEmpty(): Promise<boolean> {
    return (await this.count()) === 0;
  }
}
