import type { CompiledQuery, CriteriaSet, QueryParam } from './types.js';
import { quote } from './criteria.js';

function filterParams(set: CriteriaSet): QueryParam[] {
  if (set.filter.length === 0) return [];
  return [['$filter', set.filter.map((c) => c.toString()).join(' and ')]];
}

function searchTermParams(set: CriteriaSet): QueryParam[] {
  if (set.searchTerm === null || set.searchTerm.trim() === '') return [];
  return [['searchTerm', quote(set.searchTerm)], ['includePrerelease', 'false']];
}

function listParams(name: 'orderby' | 'expand' | 'select', tokens: readonly string[]): QueryParam[] {
  return tokens.length === 0 ? [] : [[`$${name}`, tokens.join(',')]];
}

// $inlinecount is rejected by some older servers; only sent on request.
function inlineCountParams(set: CriteriaSet): QueryParam[] {
  return set.inlineCount ? [['$inlinecount', 'allpages']] : [];
}

function pagingParams(name: 'skip' | 'top', value: number): QueryParam[] {
  return value === 0 ? [] : [[`$${name}`, String(value)]];
}

/**
 * Query parameters in fixed order: filter, search term, orderby,
 * expand, select, inlinecount, skip, top. Empty categories are left out.
 */
export function compileParams(set: CriteriaSet): QueryParam[] {
  return [
    ...filterParams(set),
    ...searchTermParams(set),
    ...listParams('orderby', set.orderby),
    ...listParams('expand', set.expand),
    ...listParams('select', set.select),
    ...inlineCountParams(set),
    ...pagingParams('skip', set.skip),
    ...pagingParams('top', set.top),
  ];
}

/** `&`-joined criteria as written, or null when no parameter applies. */
export function compileCriteria(set: CriteriaSet): string | null {
  return joinParams(compileParams(set), (part) => part);
}

// `$` and `,` stay readable; `&`, `#`, `+` and `=` inside a value are escaped.
function encodeQueryComponent(part: string): string {
  return encodeURIComponent(part).replace(/%24/g, '$').replace(/%2C/g, ',');
}

function joinParams(params: readonly QueryParam[], encode: (part: string) => string): string | null {
  if (params.length === 0) return null;
  return params.map(([name, value]) => `${encode(name)}=${encode(value)}`).join('&');
}

function joinPath(base: string, criteria: string | null): string {
  return criteria === null ? base : `${base}?${criteria}`;
}

function encodedPath(base: string, params: readonly QueryParam[]): string {
  return joinPath(encodeURI(base), joinParams(params, encodeQueryComponent));
}

function freezeSet(set: CriteriaSet): CriteriaSet {
  return Object.freeze({
    filter: Object.freeze([...set.filter]),
    searchTerm: set.searchTerm,
    orderby: Object.freeze([...set.orderby]),
    expand: Object.freeze([...set.expand]),
    select: Object.freeze([...set.select]),
    inlineCount: set.inlineCount,
    skip: set.skip,
    top: set.top,
  });
}

export function compileQuery(entitySet: string, set: CriteriaSet): CompiledQuery {
  const criteriaSet = freezeSet(set);
  const params = Object.freeze(compileParams(criteriaSet).map((param) => Object.freeze(param)));
  const criteria = joinParams(params, (part) => part);
  return Object.freeze({
    entitySet,
    criteriaSet,
    params,
    criteria,
    path: joinPath(entitySet, criteria),
    requestPath: encodedPath(entitySet, params),
  });
}

/** Readable path of the `$count` endpoint for the same criteria. */
export function compileCountPath(query: CompiledQuery): string {
  return joinPath(`${query.entitySet}/$count`, query.criteria);
}

/** {@link compileCountPath}, encoded for the wire. */
export function compileCountRequestPath(query: CompiledQuery): string {
  return encodedPath(`${query.entitySet}/$count`, query.params);
}
