import type { Entity } from './entity.js';

export type PropertyValue = string | number | boolean | null;

export interface PropertyDefinition {
  name: string;
  /** Edm type name, e.g. `Edm.String` or `Edm.Int32`. */
  type: string;
  nullable?: boolean;
}

export interface EntityType {
  name: string;
  namespace?: string;
  properties: readonly PropertyDefinition[];
  navigationProperties?: readonly string[];
}

/** Metadata handed to the parser alongside each page body. */
export interface EntityOptions {
  entityType: EntityType;
  entitySetName: string;
}

export interface RawResponse {
  status: number;
  url: string;
  body: string;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * A remote endpoint that resolves query paths relative to `serviceUrl`.
 * Implementations throw on transport failure or a non-success status.
 */
export interface Service {
  readonly name: string;
  readonly serviceUrl: string;
  execute(path: string, options?: RequestOptions, isRawUrl?: boolean): Promise<RawResponse>;
}

export interface EntityParser {
  parse(body: string, options: EntityOptions): Entity[];
}

export interface ResultOptions {
  /** Upper bound on continuation pages fetched after the first one. */
  maxPageFetches?: number;
}
