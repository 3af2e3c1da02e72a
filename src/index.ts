export { EntitySet } from './entity-set.js';
export type { EntitySetConfig } from './entity-set.js';
export { Entity, Property } from './entity.js';
export { Query } from './query/builder.js';
export { Criteria, CriteriaBuilder } from './query/criteria.js';
export { Result, DEFAULT_MAX_PAGE_FETCHES } from './query/result.js';
export { normalizeNextLink } from './query/next-link.js';
export type {
  ComparisonOperator,
  CriteriaValue,
  FilterOperand,
  CriteriaSet,
  CompiledQuery,
  QueryParam,
} from './query/types.js';
export { HttpService } from './service/http-service.js';
export type { HttpServiceConfig } from './service/http-service.js';
export { ServiceRegistry } from './service/registry.js';
export { AtomEntityParser } from './service/atom-parser.js';
export type {
  PropertyValue,
  PropertyDefinition,
  EntityType,
  EntityOptions,
  RawResponse,
  RequestOptions,
  Service,
  EntityParser,
  ResultOptions,
} from './types.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export { PaginationLimitError, ServiceRequestError, ResponseFormatError } from './errors.js';
export type { ServiceRequestErrorDetails } from './errors.js';
