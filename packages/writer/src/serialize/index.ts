// Re-export public API
export type { SerializeOptions } from "./types.js";
export { serializeDocument } from "./serializeDocument.js";
export { formatFloat } from "./serializeScalar.js";
export { RenderError, type RenderFailure } from "./errors.js";
