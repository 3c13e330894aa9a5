import { z } from "zod";
import { DATA_TYPES, type DataType } from "@oddl/core/document";

// ------------------------------------------------------------------------------
// Document descriptions
//
// A plain-data (YAML or JSON) description of a document tree, turned into a
// Document by buildDocument. Uses z.lazy() only for structures, the only
// recursive type.
// ------------------------------------------------------------------------------

const ScalarDescription = z.union([z.boolean(), z.number(), z.string()]);

type ScalarDescription = z.infer<typeof ScalarDescription>;

export const PrimitiveDescription = z.object({
  type: z.enum(DATA_TYPES),
  // `ref` elements are structure names
  data: z.array(z.union([ScalarDescription, z.array(ScalarDescription)])),
  name: z.string().optional(),
  vectorSize: z.number().int().nonnegative().optional(),
  comment: z.string().optional(),
  maxElementsPerLine: z.number().int().positive().optional(),
});

export type PrimitiveDescription = {
  type: DataType;
  data: (ScalarDescription | ScalarDescription[])[];
  name?: string;
  vectorSize?: number;
  comment?: string;
  maxElementsPerLine?: number;
};

export type StructureDescription = {
  identifier: string;
  name?: string;
  comment?: string;
  properties?: Record<string, ScalarDescription>;
  children?: ChildDescription[];
};

export type ChildDescription = StructureDescription | PrimitiveDescription;

export const StructureDescription: z.ZodType<StructureDescription> = z.lazy(
  () =>
    z.object({
      identifier: z.string().min(1),
      name: z.string().optional(),
      comment: z.string().optional(),
      properties: z.record(z.string(), ScalarDescription).optional(),
      children: z
        .array(z.union([StructureDescription, PrimitiveDescription]))
        .optional(),
    })
);

export const DocumentDescription = z.object({
  structures: z.array(StructureDescription).default([]),
});

export type DocumentDescription = z.infer<typeof DocumentDescription>;

export function isStructureDescription(
  child: ChildDescription
): child is StructureDescription {
  return "identifier" in child;
}
