import type { Structure } from "./Structure.js";

export const DATA_TYPES = [
  "bool",
  "int8",
  "int16",
  "int32",
  "int64",
  "unsigned_int8",
  "unsigned_int16",
  "unsigned_int32",
  "unsigned_int64",
  "half",
  "float",
  "double",
  "string",
  "ref",
  "type",
] as const;

export type DataType = (typeof DATA_TYPES)[number];

export type IntegerDataType =
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "unsigned_int8"
  | "unsigned_int16"
  | "unsigned_int32"
  | "unsigned_int64"
  | "half";

export type FloatDataType = "float" | "double";

/**
 * Target of a `ref` element: either the structure itself or its name,
 * looked up in the document when rendering.
 */
export type ReferenceTarget = Structure | string;

export type ScalarOf<T extends DataType> = T extends "bool"
  ? boolean
  : T extends IntegerDataType
    ? number | bigint
    : T extends FloatDataType
      ? number
      : T extends "ref"
        ? ReferenceTarget
        : string;

export type Scalar = ScalarOf<DataType>;

export type PrimitiveElement<T extends DataType = DataType> =
  | ScalarOf<T>
  | readonly ScalarOf<T>[];

export function isDataType(value: unknown): value is DataType {
  return (
    typeof value === "string" &&
    (DATA_TYPES as readonly string[]).includes(value)
  );
}
