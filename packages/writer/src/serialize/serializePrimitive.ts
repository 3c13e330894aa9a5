import type { Primitive, PrimitiveElement, Scalar } from "@oddl/core/document";
import type { SerializerContext } from "./types.js";
import { RenderError } from "./errors.js";
import { getScalarFormatter, ScalarFormatter } from "./serializeScalar.js";

function isVector(element: PrimitiveElement): element is readonly Scalar[] {
  return Array.isArray(element);
}

function chunk<T>(items: T[], size: number): T[][] {
  const groups: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    groups.push(items.slice(i, i + size));
  }
  return groups;
}

// Format one element of `data`: a scalar, or the comma-joined values of a vector
function formatElement(
  element: PrimitiveElement,
  vectorSize: number,
  format: ScalarFormatter
): string {
  if (vectorSize === 0) {
    if (isVector(element)) {
      throw new RenderError({
        type: "malformedVector",
        vectorSize,
        length: element.length,
      });
    }
    return format(element);
  }
  if (!isVector(element) || element.length !== vectorSize) {
    throw new RenderError({
      type: "malformedVector",
      vectorSize,
      length: isVector(element) ? element.length : 1,
    });
  }
  return element.map(format).join(", ");
}

function resolveElementsPerLine(
  primitive: Primitive,
  ctx: SerializerContext
): number | undefined {
  const perLine = primitive.maxElementsPerLine ?? ctx.maxElementsPerLine;
  if (perLine !== undefined && !(Number.isInteger(perLine) && perLine > 0)) {
    throw new RenderError({
      type: "invalidLayoutHint",
      maxElementsPerLine: perLine,
    });
  }
  return perLine;
}

/**
 * Serialize a primitive structure.
 *
 * With `inline` set the primitive is part of a collapsed `Tag {...}` line:
 * its comment is dropped and no newline is written after it.
 */
export function serializePrimitive(
  primitive: Primitive,
  ctx: SerializerContext,
  inline = false
): void {
  const { printer } = ctx;
  const { data, vectorSize } = primitive;
  const format = getScalarFormatter(primitive.dataType, ctx);

  if (primitive.comment !== undefined && !inline) {
    printer.line(`// ${primitive.comment}`);
  }

  printer.write(primitive.dataType);
  if (vectorSize > 0) {
    printer.write(`[${vectorSize}]`);
  }
  if (primitive.name) {
    printer.write(` $${primitive.name} `);
  }

  if (data.length <= 1) {
    if (data.length === 0) {
      printer.write(" { }");
    } else if (vectorSize === 0) {
      printer.write(` {${formatElement(data[0], vectorSize, format)}}`);
    } else {
      printer.write(` { {${formatElement(data[0], vectorSize, format)}} }`);
    }
    if (!inline) {
      printer.newline();
    }
    return;
  }

  const items = data.map((element) => {
    const text = formatElement(element, vectorSize, format);
    return vectorSize === 0 ? text : `{${text}}`;
  });
  const perLine = resolveElementsPerLine(primitive, ctx);
  const groups = perLine === undefined ? [items] : chunk(items, perLine);

  printer.newline().line("{").pushIndentation();
  groups.forEach((group, index) => {
    printer.write(group.join(", "));
    if (index < groups.length - 1) {
      printer.write(",");
    }
    printer.newline();
  });
  printer.popIndentation().line("}");
}
