import { Entity } from '../entity.js';
import type { EntityOptions, EntityParser, PropertyDefinition, PropertyValue } from '../types.js';
import { attribute, isNode, parseFeed, TEXT } from '../xml/feed.js';
import type { XmlNode } from '../xml/feed.js';

const NUMERIC_TYPES = new Set([
  'Edm.Byte',
  'Edm.SByte',
  'Edm.Int16',
  'Edm.Int32',
  'Edm.Double',
  'Edm.Single',
]);

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (isNode(value)) {
    const text = value[TEXT];
    return typeof text === 'string' ? text : '';
  }
  return undefined;
}

export function convertValue(raw: unknown, def: PropertyDefinition): PropertyValue {
  if (isNode(raw) && attribute(raw, 'null') === 'true') return null;
  const text = textOf(raw);
  if (text === undefined) return null;

  if (def.type === 'Edm.Boolean') return text === 'true';
  if (NUMERIC_TYPES.has(def.type)) {
    const n = Number(text);
    return text.trim() === '' || Number.isNaN(n) ? null : n;
  }
  // Edm.Int64 and Edm.Decimal stay strings: they may exceed double precision.
  return text;
}

function propertiesOf(entry: XmlNode): XmlNode | undefined {
  const content = entry['content'];
  const nested = isNode(content) ? content['properties'] : undefined;
  if (isNode(nested)) return nested;
  const properties = entry['properties'];
  return isNode(properties) ? properties : undefined;
}

/**
 * Decodes the `<entry>` elements of an Atom page into entities of the
 * set's declared type. Undeclared elements are ignored.
 */
export class AtomEntityParser implements EntityParser {
  parse(body: string, options: EntityOptions): Entity[] {
    const { entityType } = options;
    return parseFeed(body).entries.map((entry) => {
      const properties: XmlNode = propertiesOf(entry) ?? {};
      const values: Record<string, PropertyValue> = {};
      for (const def of entityType.properties) {
        values[def.name] = convertValue(properties[def.name], def);
      }
      return new Entity(entityType, values);
    });
  }
}
