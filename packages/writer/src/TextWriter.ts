import type { Document, Primitive } from "@oddl/core/document";
import { ok, err, Result } from "@oddl/core/result";
import {
  WriterConfiguration,
  WriterConfigurationInput,
} from "@oddl/core/configuration";
import { serializeDocument } from "./serialize/serializeDocument.js";
import { RenderError, RenderFailure } from "./serialize/errors.js";
import { NodeVFS } from "./vfs/NodeVFS.js";
import type { VFS, VFSError } from "./vfs/VFS.js";

export type WriteError = { type: "render"; failure: RenderFailure } | VFSError;

/**
 * Writes documents in the human-readable OpenDDL text form.
 */
export class TextWriter {
  readonly config: WriterConfiguration;

  constructor(config: WriterConfigurationInput = {}) {
    this.config = WriterConfiguration.parse(config);
  }

  /**
   * Render `document` to text. Throws a RenderError for values that cannot
   * be written.
   */
  render(document: Document): string {
    const text = serializeDocument(document, {
      rounding: this.config.rounding,
      maxElementsPerLine: this.config.maxElementsPerLine,
    });
    this.debug(
      `rendered ${document.structures.length} structures, ${text.length} characters`
    );
    return text;
  }

  renderBytes(document: Document): Uint8Array {
    return new TextEncoder().encode(this.render(document));
  }

  /**
   * Render `document` and write it to `path`. Nothing is opened unless
   * rendering succeeds.
   */
  async write(
    document: Document,
    path: string,
    vfs: VFS = new NodeVFS()
  ): Promise<Result<void, WriteError>> {
    let text: string;
    try {
      text = this.render(document);
    } catch (error) {
      if (error instanceof RenderError) {
        return err({ type: "render", failure: error.failure });
      }
      throw error;
    }

    const result = await vfs.writeFile(path, text);
    if (result.success) {
      this.debug(`wrote ${path}`);
      return ok(undefined);
    }
    return result;
  }

  static setMaxElementsPerLine(primitive: Primitive, elements: number): void {
    primitive.maxElementsPerLine = elements;
  }

  private debug(message: string): void {
    if (this.config.debug) {
      console.debug(`[oddl] ${message}`);
    }
  }
}
