import * as fs from "node:fs/promises";
import { ok, err, Result } from "@oddl/core/result";
import { VFS, VFSError } from "./VFS.js";

export class NodeVFS implements VFS {
  async readFile(filePath: string): Promise<Result<string, VFSError>> {
    try {
      const content = await fs.readFile(filePath, "utf-8");
      return ok(content);
    } catch (error) {
      return err(this.mapError(filePath, error));
    }
  }

  async writeFile(
    filePath: string,
    content: string
  ): Promise<Result<void, VFSError>> {
    try {
      const handle = await fs.open(filePath, "w");
      try {
        await handle.writeFile(content, "utf-8");
      } finally {
        await handle.close();
      }
      return ok(undefined);
    } catch (error) {
      return err(this.mapError(filePath, error));
    }
  }

  private mapError(filePath: string, error: unknown): VFSError {
    if (error instanceof Error && "code" in error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === "ENOENT") {
        return { type: "notFound", path: filePath };
      }
      if (code === "EACCES" || code === "EPERM") {
        return { type: "permissionDenied", path: filePath };
      }
      if (code === "EISDIR") {
        return { type: "isDirectory", path: filePath };
      }
    }
    const message = error instanceof Error ? error.message : String(error);
    return { type: "unknown", path: filePath, message };
  }
}
