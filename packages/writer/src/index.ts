export { TextWriter, type WriteError } from "./TextWriter.js";
export * from "./serialize/index.js";
export type { VFS, VFSError, ReadFileResult, WriteFileResult } from "./vfs/VFS.js";
export { NodeVFS } from "./vfs/NodeVFS.js";
export { MemoryVFS } from "./vfs/MemoryVFS.js";
export {
  DocumentDescription,
  StructureDescription,
  PrimitiveDescription,
  type ChildDescription,
} from "./description/DocumentDescription.js";
export {
  buildDocument,
  parseDescription,
  type DescriptionError,
} from "./description/buildDocument.js";
export { runCli, type CliIO } from "./cli.js";
