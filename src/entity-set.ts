import { Entity } from './entity.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { Query } from './query/builder.js';
import { resolveMaxPageFetches } from './query/result.js';
import { AtomEntityParser } from './service/atom-parser.js';
import type { EntityOptions, EntityParser, EntityType, Service } from './types.js';

export interface EntitySetConfig {
  name: string;
  service: Service;
  entityType: EntityType;
  /** Defaults to AtomEntityParser. */
  parser?: EntityParser;
  /** Continuation pages a Result may fetch before giving up. Default 100. */
  maxPageFetches?: number;
  logger?: Logger;
}

/** A named collection of entities of one type, exposed by a service. */
export class EntitySet {
  readonly name: string;
  readonly service: Service;
  readonly entityType: EntityType;
  readonly parser: EntityParser;
  readonly maxPageFetches: number;
  readonly logger: Logger;

  constructor(config: EntitySetConfig) {
    this.name = config.name;
    this.service = config.service;
    this.entityType = config.entityType;
    this.parser = config.parser ?? new AtomEntityParser();
    this.maxPageFetches = resolveMaxPageFetches(config.maxPageFetches);
    this.logger = config.logger ?? createLogger();
  }

  get entityOptions(): EntityOptions {
    return { entityType: this.entityType, entitySetName: this.name };
  }

  /** Blank instance of the entity type; used to resolve property names. */
  newEntity(): Entity {
    return new Entity(this.entityType);
  }

  query(): Query {
    return new Query(this);
  }
}
