export type PropertyValue =
  | { type: "bool"; value: boolean }
  | { type: "int"; value: number | bigint }
  | { type: "float"; value: number }
  | { type: "string"; value: string };

export type PropertyValueInput = PropertyValue | boolean | number | bigint | string;

export interface Property {
  key: string;
  value: PropertyValue;
}

export type PropertiesInput =
  | Record<string, PropertyValueInput>
  | ReadonlyArray<readonly [string, PropertyValueInput]>;

/**
 * Tag a raw JS value. Integral numbers become `int`; pass
 * `{ type: "float", value }` to keep a whole number a float.
 */
export function toPropertyValue(input: PropertyValueInput): PropertyValue {
  switch (typeof input) {
    case "boolean":
      return { type: "bool", value: input };
    case "bigint":
      return { type: "int", value: input };
    case "number":
      return Number.isInteger(input)
        ? { type: "int", value: input }
        : { type: "float", value: input };
    case "string":
      return { type: "string", value: input };
    default:
      return input;
  }
}

export function toProperties(input: PropertiesInput): Property[] {
  const entries = isEntryList(input) ? input : Object.entries(input);
  const properties: Property[] = [];
  for (const [key, value] of entries) {
    const existing = properties.find((property) => property.key === key);
    if (existing) {
      existing.value = toPropertyValue(value);
    } else {
      properties.push({ key, value: toPropertyValue(value) });
    }
  }
  return properties;
}

function isEntryList(
  input: PropertiesInput
): input is ReadonlyArray<readonly [string, PropertyValueInput]> {
  return Array.isArray(input);
}
