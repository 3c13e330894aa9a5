import { Result } from "@oddl/core/result";

export type VFSError =
  | { type: "notFound"; path: string }
  | { type: "permissionDenied"; path: string }
  | { type: "isDirectory"; path: string }
  | { type: "unknown"; path: string; message: string };

export type ReadFileResult = Result<string, VFSError>;

export type WriteFileResult = Result<void, VFSError>;

export interface VFS {
  readFile(path: string): Promise<ReadFileResult>;
  /** Create or truncate `path` and write `content` as UTF-8 */
  writeFile(path: string, content: string): Promise<WriteFileResult>;
}
