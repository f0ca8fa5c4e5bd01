import { ItemsType, PropertyType } from "../analysis/SchemaTypeResolver.js";

export interface PropertyDescriptor {
  /** Name as declared in the document */
  readonly name: string;
  /** Terraform compliant name: the field-name extension or the snake_cased name */
  readonly preferredName: string;
  readonly type: PropertyType;
  /** Set for `list` properties */
  readonly arrayItemsType?: ItemsType;
  /** Set for `object` properties and lists of objects */
  readonly nestedSchema?: SchemaDefinition;
  readonly required: boolean;
  readonly readOnly: boolean;
  readonly computed: boolean;
  readonly forceNew: boolean;
  readonly sensitive: boolean;
  readonly immutable: boolean;
  readonly isIdentifier: boolean;
  readonly isStatusIdentifier: boolean;
  readonly default?: unknown;
}

export const IDENTIFIER_PROPERTY_NAME = "id";
export const STATUS_PROPERTY_NAME = "status";

export class SchemaDefinition {
  readonly properties: readonly PropertyDescriptor[];

  constructor(properties: readonly PropertyDescriptor[]) {
    this.properties = Object.freeze([...properties]);
  }

  getProperty(name: string): PropertyDescriptor | undefined {
    return this.properties.find((p) => p.name === name);
  }

  /**
   * A property flagged with `x-terraform-id` wins over one named `id`.
   */
  getIdentifierProperty(): PropertyDescriptor | undefined {
    return (
      this.properties.find((p) => p.isIdentifier) ??
      this.getProperty(IDENTIFIER_PROPERTY_NAME)
    );
  }

  /**
   * A property flagged with `x-terraform-field-status` wins over one named `status`.
   */
  getStatusIdentifierProperty(): PropertyDescriptor | undefined {
    return (
      this.properties.find((p) => p.isStatusIdentifier) ??
      this.getProperty(STATUS_PROPERTY_NAME)
    );
  }

  immutablePropertyNames(): string[] {
    return this.properties
      .filter((p) => p.immutable && p.name !== IDENTIFIER_PROPERTY_NAME)
      .map((p) => p.name);
  }

  withProperties(extra: readonly PropertyDescriptor[]): SchemaDefinition {
    return new SchemaDefinition([...this.properties, ...extra]);
  }
}
