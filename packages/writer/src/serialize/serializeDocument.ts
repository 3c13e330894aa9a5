import type { Document } from "@oddl/core/document";
import type { SerializeOptions, SerializerContext } from "./types.js";
import { Printer } from "./Printer.js";
import { RenderError } from "./errors.js";
import { serializeStructure } from "./serializeStructure.js";

/**
 * Serialize a document to OpenDDL text.
 *
 * The document must not be mutated while this runs. Throws a RenderError
 * when a value cannot be written; no partial output is returned.
 */
export function serializeDocument(
  document: Document,
  options: SerializeOptions = {}
): string {
  const { rounding = 6, maxElementsPerLine } = options;
  if (rounding !== null && !(Number.isInteger(rounding) && rounding >= 0)) {
    throw new RenderError({ type: "invalidRounding", rounding });
  }

  const ctx: SerializerContext = {
    printer: new Printer(),
    rounding,
    maxElementsPerLine,
    resolveName: (name) => document.findStructure(name),
  };

  for (const structure of document.structures) {
    serializeStructure(structure, ctx);
  }

  return ctx.printer.toString();
}
