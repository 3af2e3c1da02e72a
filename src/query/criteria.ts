import type { ComparisonOperator, CriteriaExpression, CriteriaValue, FilterOperand } from './types.js';

export function operandName(operand: FilterOperand): string {
  return operand.kind === 'property' ? operand.property.name : operand.name;
}

/** Single-quotes a string literal, doubling any embedded quote. */
export function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function renderValue(value: CriteriaValue): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return quote(value);
  return String(value);
}

/**
 * One comparison in a $filter clause. Operators are not checked against
 * the property type; the server rejects combinations it does not accept.
 */
export class Criteria implements CriteriaExpression {
  constructor(
    readonly operand: FilterOperand,
    readonly operator: ComparisonOperator,
    readonly value: CriteriaValue,
  ) {
    Object.freeze(this);
  }

  get propertyName(): string {
    return operandName(this.operand);
  }

  toString(): string {
    return `${this.propertyName} ${this.operator} ${renderValue(this.value)}`;
  }
}

/**
 * Intermediate step returned by Query.property(): holds the operand and
 * awaits an operator and value.
 */
export class CriteriaBuilder {
  constructor(readonly operand: FilterOperand) {}

  compare(operator: ComparisonOperator, value: CriteriaValue): Criteria {
    return new Criteria(this.operand, operator, value);
  }

  eq(value: CriteriaValue): Criteria {
    return this.compare('eq', value);
  }

  ne(value: CriteriaValue): Criteria {
    return this.compare('ne', value);
  }

  gt(value: CriteriaValue): Criteria {
    return this.compare('gt', value);
  }

  ge(value: CriteriaValue): Criteria {
    return this.compare('ge', value);
  }

  lt(value: CriteriaValue): Criteria {
    return this.compare('lt', value);
  }

  le(value: CriteriaValue): Criteria {
    return this.compare('le', value);
  }
}
