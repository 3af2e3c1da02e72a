import type { EntityType, PropertyValue } from './types.js';

export class Property {
  constructor(
    readonly name: string,
    readonly type: string,
    readonly value: PropertyValue = null,
  ) {}

  /** Renders as the property name so it can stand in a filter expression. */
  toString(): string {
    return this.name;
  }
}

/**
 * One record of an entity type. Every declared property is present;
 * those without a decoded value hold null.
 */
export class Entity {
  private readonly properties: Map<string, Property>;

  constructor(
    readonly type: EntityType,
    values: Readonly<Record<string, PropertyValue>> = {},
  ) {
    this.properties = new Map(
      type.properties.map((def) => [def.name, new Property(def.name, def.type, values[def.name] ?? null)]),
    );
  }

  getProperty(name: string): Property | undefined {
    return this.properties.get(name);
  }

  get(name: string): PropertyValue | undefined {
    return this.properties.get(name)?.value;
  }

  toJSON(): Record<string, PropertyValue> {
    const out: Record<string, PropertyValue> = {};
    for (const [name, property] of this.properties) {
      out[name] = property.value;
    }
    return out;
  }
}
