import type { Structure } from "@oddl/core/document";
import type { Printer } from "./Printer.js";

// Public options for serialization
export interface SerializeOptions {
  rounding?: number | null; // Default: 6, null keeps full precision
  maxElementsPerLine?: number; // Default: unset, no wrapping
}

// Internal context for recursive serialization
export interface SerializerContext {
  printer: Printer;
  rounding: number | null;
  maxElementsPerLine: number | undefined;
  resolveName: (name: string) => Structure | undefined;
}
