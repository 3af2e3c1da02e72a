import { vi } from 'vitest';
import { EntitySet } from '../../src/entity-set.js';
import type { EntityType, RawResponse, Service } from '../../src/types.js';

export const SERVICE_URL = 'http://example.test/odata/Catalog.svc';

export const productType: EntityType = {
  name: 'Product',
  namespace: 'Catalog',
  properties: [
    { name: 'ID', type: 'Edm.Int32' },
    { name: 'Name', type: 'Edm.String' },
    { name: 'Price', type: 'Edm.Decimal' },
    { name: 'Discontinued', type: 'Edm.Boolean' },
  ],
  navigationProperties: ['Category', 'Supplier'],
};

export interface ProductRow {
  id: number;
  name: string;
}

export function entryXml({ id, name }: ProductRow): string {
  return [
    '<entry>',
    `  <id>${SERVICE_URL}/Products(${id})</id>`,
    `  <link rel="edit" href="Products(${id})" />`,
    '  <content type="application/xml">',
    '    <m:properties>',
    `      <d:ID m:type="Edm.Int32">${id}</d:ID>`,
    `      <d:Name>${name}</d:Name>`,
    '    </m:properties>',
    '  </content>',
    '</entry>',
  ].join('\n');
}

export function feedXml(rows: ProductRow[], next?: string): string {
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    `<feed xml:base="${SERVICE_URL}/" xmlns="http://www.w3.org/2005/Atom"`,
    '  xmlns:d="http://schemas.microsoft.com/ado/2007/08/dataservices"',
    '  xmlns:m="http://schemas.microsoft.com/ado/2007/08/dataservices/metadata">',
    '  <title type="text">Products</title>',
    '  <link rel="self" title="Products" href="Products" />',
    ...rows.map(entryXml),
    ...(next !== undefined ? [`  <link rel="next" href="${next}" />`] : []),
    '</feed>',
  ].join('\n');
}

export function response(body: string, url = 'Products'): RawResponse {
  return { status: 200, url, body };
}

/** Service fake that answers each execute() with the next body in order. */
export function makeMockService(...bodies: string[]) {
  const execute = vi.fn<Service['execute']>();
  for (const body of bodies) {
    execute.mockResolvedValueOnce(response(body));
  }
  const service: Service = { name: 'Catalog', serviceUrl: SERVICE_URL, execute };
  return { service, execute };
}

export function makeEntitySet(service: Service, maxPageFetches?: number): EntitySet {
  return new EntitySet({
    name: 'Products',
    service,
    entityType: productType,
    ...(maxPageFetches !== undefined ? { maxPageFetches } : {}),
  });
}
