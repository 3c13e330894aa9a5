import { parse as parseYaml } from "yaml";
import { Document, Structure } from "@oddl/core/document";
import { ok, err, andThen, Result } from "@oddl/core/result";
import {
  ChildDescription,
  DocumentDescription,
  StructureDescription,
  isStructureDescription,
} from "./DocumentDescription.js";

export type DescriptionError =
  | { type: "syntax"; message: string }
  | { type: "invalid"; issues: string[] };

function parseYamlText(text: string): Result<unknown, DescriptionError> {
  try {
    return ok(parseYaml(text));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err({ type: "syntax", message });
  }
}

function validateDescription(
  raw: unknown
): Result<DocumentDescription, DescriptionError> {
  const parsed = DocumentDescription.safeParse(raw ?? {});
  if (!parsed.success) {
    return err({
      type: "invalid",
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.map(String).join(".")}: ${issue.message}`
      ),
    });
  }
  return ok(parsed.data);
}

/**
 * Parse a YAML (or JSON) document description.
 */
export function parseDescription(
  text: string
): Result<DocumentDescription, DescriptionError> {
  return andThen(validateDescription)(parseYamlText(text));
}

function addChild(parent: Structure, child: ChildDescription): void {
  if (isStructureDescription(child)) {
    addStructure(parent.addStructure(child.identifier), child);
    return;
  }
  parent.addPrimitive(child.type, child.data, {
    name: child.name,
    vectorSize: child.vectorSize,
    comment: child.comment,
    maxElementsPerLine: child.maxElementsPerLine,
  });
}

function addStructure(
  structure: Structure,
  description: StructureDescription
): void {
  structure.name = description.name || undefined;
  structure.comment = description.comment;
  for (const [key, value] of Object.entries(description.properties ?? {})) {
    structure.setProperty(key, value);
  }
  for (const child of description.children ?? []) {
    addChild(structure, child);
  }
}

/**
 * Build a document from its description. `ref` data keeps structure names,
 * resolved when the document is rendered.
 */
export function buildDocument(description: DocumentDescription): Document {
  const document = new Document();
  for (const structure of description.structures) {
    addStructure(document.addStructure(structure.identifier), structure);
  }
  return document;
}
