import { stringify } from "yaml";
import { vi } from "vitest";
import { runCli } from "../../src/cli.js";
import { MemoryVFS } from "../../src/vfs/MemoryVFS.js";

export type TestCliResult = {
  code: number;
  stdout: string;
  errors: string[];
  info: string[];
};

/**
 * Create an in-memory file system with descriptions given as plain objects,
 * stored as YAML.
 */
export function createTestVfs(files: Record<string, unknown>): MemoryVFS {
  const entries = Object.entries(files).map(
    ([path, content]): [string, string] => [
      path,
      typeof content === "string" ? content : stringify(content),
    ]
  );
  return new MemoryVFS(new Map(entries));
}

/**
 * Run the CLI against `vfs`, capturing stdout and console output.
 */
export async function runTestCli(
  argv: string[],
  vfs: MemoryVFS
): Promise<TestCliResult> {
  const errors: string[] = [];
  const info: string[] = [];
  const error = vi
    .spyOn(console, "error")
    .mockImplementation((message: unknown) => {
      errors.push(String(message));
    });
  const log = vi
    .spyOn(console, "info")
    .mockImplementation((message: unknown) => {
      info.push(String(message));
    });

  let stdout = "";
  try {
    const code = await runCli(argv, {
      vfs,
      stdout: (text) => {
        stdout += text;
      },
    });
    return { code, stdout, errors, info };
  } finally {
    error.mockRestore();
    log.mockRestore();
  }
}
