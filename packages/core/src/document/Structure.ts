import type { DataType, PrimitiveElement } from "./DataType.js";
import { Primitive, PrimitiveOptions } from "./Primitive.js";
import {
  PropertiesInput,
  Property,
  PropertyValueInput,
  toProperties,
  toPropertyValue,
} from "./PropertyValue.js";

export type Child = Primitive | Structure;

export interface StructureOptions {
  name?: string;
  children?: readonly Child[];
  properties?: PropertiesInput;
  comment?: string;
}

/**
 * A typed node of the document tree. Owns its children and properties;
 * `ref` primitives elsewhere may point at it by name.
 */
export class Structure {
  readonly kind = "structure";
  name: string | undefined;
  children: Child[];
  properties: Property[];
  comment: string | undefined;

  constructor(
    readonly identifier: string,
    options: StructureOptions = {}
  ) {
    this.name = options.name || undefined;
    this.children = [...(options.children ?? [])];
    this.properties = options.properties ? toProperties(options.properties) : [];
    this.comment = options.comment;
  }

  /**
   * A simple structure has no name, no properties and a single simple
   * primitive child. It renders on one line.
   */
  isSimple(): boolean {
    if (this.children.length !== 1) return false;
    if (this.properties.length !== 0) return false;
    if (this.name) return false;
    const [child] = this.children;
    return child.kind === "primitive" && child.isSimple();
  }

  addStructure(identifier: string, options?: StructureOptions): Structure {
    const structure = new Structure(identifier, options);
    this.children.push(structure);
    return structure;
  }

  addPrimitive<T extends DataType>(
    dataType: T,
    data: readonly PrimitiveElement<T>[],
    options?: PrimitiveOptions
  ): this {
    this.children.push(new Primitive(dataType, data, options));
    return this;
  }

  setProperty(key: string, value: PropertyValueInput): this {
    const existing = this.properties.find((property) => property.key === key);
    if (existing) {
      existing.value = toPropertyValue(value);
    } else {
      this.properties.push({ key, value: toPropertyValue(value) });
    }
    return this;
  }

  /** Depth-first pre-order search of this subtree, including itself */
  find(name: string): Structure | undefined {
    if (this.name === name) return this;
    for (const child of this.children) {
      if (child.kind !== "structure") continue;
      const found = child.find(name);
      if (found) return found;
    }
    return undefined;
  }
}
