import type { Structure } from "@oddl/core/document";
import type { SerializerContext } from "./types.js";
import { serializePrimitive } from "./serializePrimitive.js";
import { serializeProperty } from "./serializeProperty.js";

// Serialize a structure and its subtree at the printer's current indentation
export function serializeStructure(
  structure: Structure,
  ctx: SerializerContext
): void {
  const { printer } = ctx;

  if (structure.comment !== undefined) {
    printer.line(`// ${structure.comment}`);
  }

  printer.write(structure.identifier);
  if (structure.name) {
    printer.write(` $${structure.name}`);
  }
  if (structure.properties.length > 0) {
    printer.write(` (${structure.properties.map(serializeProperty).join(", ")})`);
  }

  // Simple structures collapse to `Identifier {type {value}}`
  const [onlyChild] = structure.children;
  if (structure.isSimple() && onlyChild.kind === "primitive") {
    printer.write(" {");
    serializePrimitive(onlyChild, ctx, true);
    printer.write("}").newline();
    return;
  }

  printer.newline().line("{").pushIndentation();
  for (const child of structure.children) {
    switch (child.kind) {
      case "primitive":
        serializePrimitive(child, ctx);
        break;
      case "structure":
        serializeStructure(child, ctx);
        break;
    }
  }
  printer.popIndentation().line("}");
}
