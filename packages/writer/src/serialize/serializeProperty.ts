import type { Property } from "@oddl/core/document";
import { RenderError } from "./errors.js";
import { formatFloat } from "./serializeScalar.js";

// Serialize a key-value pair as `key = value`. Floats are never rounded here.
export function serializeProperty({ key, value }: Property): string {
  switch (value.type) {
    case "bool":
      if (typeof value.value === "boolean") {
        return `${key} = ${value.value ? "true" : "false"}`;
      }
      break;
    case "int":
      if (typeof value.value === "number" || typeof value.value === "bigint") {
        return `${key} = ${String(value.value)}`;
      }
      break;
    case "float":
      if (typeof value.value === "number") {
        return `${key} = ${formatFloat(value.value, null)}`;
      }
      break;
    case "string":
      if (typeof value.value === "string") {
        return `${key} = "${value.value}"`;
      }
      break;
  }
  throw new RenderError({ type: "unsupportedPropertyValue", key, value });
}
