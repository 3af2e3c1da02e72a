import type { Property } from '../entity.js';

export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le';

export type CriteriaValue = string | number | null;

/**
 * Left-hand side of a comparison: either a property the entity type
 * declares, or a name it does not know about, passed through as-is.
 */
export type FilterOperand =
  | { kind: 'property'; property: Property }
  | { kind: 'raw';      name: string };

export interface CriteriaExpression {
  readonly operand: FilterOperand;
  readonly operator: ComparisonOperator;
  readonly value: CriteriaValue;
  toString(): string;
}

/** One `name=value` pair of the query string, unencoded. */
export type QueryParam = readonly [name: string, value: string];

/** Snapshot of everything a Query has accumulated. */
export interface CriteriaSet {
  readonly filter: readonly CriteriaExpression[];
  readonly searchTerm: string | null;
  readonly orderby: readonly string[];
  readonly expand: readonly string[];
  readonly select: readonly string[];
  readonly inlineCount: boolean;
  readonly skip: number;
  readonly top: number;
}

/**
 * Immutable result of Query.compile(). Holds its own copy of the
 * criteria set, so later builder calls never leak into it.
 */
export interface CompiledQuery {
  readonly entitySet: string;
  readonly criteriaSet: CriteriaSet;
  readonly params: readonly QueryParam[];
  /** `&`-joined criteria, or null when nothing is set. */
  readonly criteria: string | null;
  /** `<entitySet>?<criteria>`, or just `<entitySet>`. */
  readonly path: string;
  /** {@link path} with each parameter name and value percent-encoded. */
  readonly requestPath: string;
}
