import type { DataType } from "@oddl/core/document";

export type RenderFailure =
  | { type: "unsupportedPropertyValue"; key: string; value: unknown }
  | { type: "unsupportedDataType"; dataType: string }
  | { type: "unsupportedValue"; dataType: DataType; value: unknown }
  | { type: "danglingReference"; target: string | undefined }
  | { type: "malformedVector"; vectorSize: number; length: number }
  | { type: "invalidLayoutHint"; maxElementsPerLine: number }
  | { type: "invalidRounding"; rounding: number };

function describeFailure(failure: RenderFailure): string {
  switch (failure.type) {
    case "unsupportedPropertyValue":
      return `Unknown property type for property "${failure.key}"`;
    case "unsupportedDataType":
      return `Encountered unknown primitive type "${failure.dataType}"`;
    case "unsupportedValue":
      return `Value ${String(failure.value)} is not valid for primitive type ${failure.dataType}`;
    case "danglingReference":
      return failure.target === undefined
        ? "Referenced structure has no name"
        : `No structure named "${failure.target}" to reference`;
    case "malformedVector":
      return `Expected vectors of size ${failure.vectorSize}, got ${failure.length} values`;
    case "invalidLayoutHint":
      return `maxElementsPerLine must be a positive integer, got ${failure.maxElementsPerLine}`;
    case "invalidRounding":
      return `rounding must be a non-negative integer or null, got ${failure.rounding}`;
  }
}

export class RenderError extends Error {
  constructor(readonly failure: RenderFailure) {
    super(describeFailure(failure));
    this.name = "RenderError";
  }
}
