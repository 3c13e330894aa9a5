import type { DataType, Scalar } from "@oddl/core/document";
import type { SerializerContext } from "./types.js";
import { RenderError } from "./errors.js";

export type ScalarFormatter = (value: Scalar) => string;

// Round to `places` decimals, resolving exact ties of the binary value to
// the even digit. Works from the exact mantissa and exponent of the double.
function roundHalfEven(value: number, places: number): number {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const negative = bits >> 63n === 1n;
  const exponentBits = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & 0xfffffffffffffn;
  const mantissa = exponentBits === 0 ? fraction : fraction | (1n << 52n);
  const exponent = (exponentBits === 0 ? 1 : exponentBits) - 1075;

  // value * 10^places is already whole
  if (exponent >= 0 || places >= -exponent) {
    return value;
  }

  const scaled = mantissa * 10n ** BigInt(places);
  const divisor = 1n << BigInt(-exponent);
  let quotient = scaled / divisor;
  const twiceRemainder = (scaled % divisor) * 2n;
  if (
    twiceRemainder > divisor ||
    (twiceRemainder === divisor && quotient % 2n === 1n)
  ) {
    quotient += 1n;
  }

  const magnitude = Number(`${quotient}e-${places}`);
  return negative ? -magnitude : magnitude;
}

/**
 * Format a float for output. Non-finite values are written as `0.0`;
 * whole numbers keep a trailing `.0`, negative zero keeps its sign.
 */
export function formatFloat(value: number, rounding: number | null): string {
  if (!Number.isFinite(value)) {
    return "0.0";
  }
  const rounded = rounding === null ? value : roundHalfEven(value, rounding);
  const text = Object.is(rounded, -0) ? "-0" : String(rounded);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

// Pick the conversion function for a primitive's data type
export function getScalarFormatter(
  dataType: DataType,
  ctx: SerializerContext
): ScalarFormatter {
  const unsupported = (value: Scalar): RenderError =>
    new RenderError({ type: "unsupportedValue", dataType, value });

  switch (dataType) {
    case "bool":
      return (value) => {
        if (typeof value !== "boolean") throw unsupported(value);
        return value ? "true" : "false";
      };
    case "int8":
    case "int16":
    case "int32":
    case "int64":
    case "unsigned_int8":
    case "unsigned_int16":
    case "unsigned_int32":
    case "unsigned_int64":
    case "half":
      return (value) => {
        if (typeof value !== "number" && typeof value !== "bigint") {
          throw unsupported(value);
        }
        return String(value);
      };
    case "float":
    case "double":
      return (value) => {
        if (typeof value !== "number") throw unsupported(value);
        return formatFloat(value, ctx.rounding);
      };
    case "string":
    case "type":
      return (value) => {
        if (typeof value !== "string") throw unsupported(value);
        return value;
      };
    case "ref":
      return (value) => formatReference(value, ctx);
    default: {
      const unknownType: never = dataType;
      throw new RenderError({
        type: "unsupportedDataType",
        dataType: String(unknownType),
      });
    }
  }
}

// References render as `$name` of the target structure
function formatReference(value: Scalar, ctx: SerializerContext): string {
  if (typeof value === "string") {
    const target = ctx.resolveName(value);
    if (!target?.name) {
      throw new RenderError({ type: "danglingReference", target: value });
    }
    return `$${target.name}`;
  }
  if (typeof value === "object") {
    if (!value.name) {
      throw new RenderError({ type: "danglingReference", target: undefined });
    }
    return `$${value.name}`;
  }
  throw new RenderError({ type: "unsupportedValue", dataType: "ref", value });
}
