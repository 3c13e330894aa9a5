/**
 * oddl-write - render a YAML/JSON document description as OpenDDL text
 */

import { parseArgs } from "node:util";
import { pathToFileURL } from "node:url";
import { WriterConfigurationInput } from "@oddl/core/configuration";
import { TextWriter, WriteError } from "./TextWriter.js";
import { buildDocument, parseDescription } from "./description/buildDocument.js";
import { RenderError } from "./serialize/errors.js";
import { NodeVFS } from "./vfs/NodeVFS.js";
import type { VFS } from "./vfs/VFS.js";

const USAGE = `Usage: oddl-write <input> [-o <output>] [--rounding <n|none>] [--max-elements-per-line <n>] [--debug]`;

export interface CliIO {
  vfs: VFS;
  stdout: (text: string) => void;
}

type CliOptions = {
  input: string;
  output: string | undefined;
  config: WriterConfigurationInput;
};

function parseCount(flag: string, value: string, min: number): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < min) {
    throw new Error(`${flag} expects an integer >= ${min}, got "${value}"`);
  }
  return count;
}

function parseCliOptions(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      rounding: { type: "string" },
      "max-elements-per-line": { type: "string" },
      debug: { type: "boolean", default: false },
    },
  });

  if (positionals.length !== 1) {
    throw new Error("Expected exactly one input file");
  }

  const config: WriterConfigurationInput = { debug: values.debug };
  if (values.rounding !== undefined) {
    config.rounding =
      values.rounding === "none"
        ? null
        : parseCount("--rounding", values.rounding, 0);
  }
  const perLine = values["max-elements-per-line"];
  if (perLine !== undefined) {
    config.maxElementsPerLine = parseCount("--max-elements-per-line", perLine, 1);
  }

  return { input: positionals[0], output: values.output, config };
}

function describeWriteError(error: WriteError): string {
  switch (error.type) {
    case "render":
      return new RenderError(error.failure).message;
    case "unknown":
      return `${error.path}: ${error.message}`;
    default:
      return `${error.path}: ${error.type}`;
  }
}

/**
 * Run the command line tool. Returns the process exit code:
 * 0 on success, 1 when the input cannot be rendered, 2 on bad usage.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliOptions(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }

  const source = await io.vfs.readFile(options.input);
  if (!source.success) {
    console.error(`Cannot read ${options.input}: ${source.error.type}`);
    return 1;
  }

  const description = parseDescription(source.data);
  if (!description.success) {
    const { error } = description;
    console.error(`Invalid document description ${options.input}`);
    if (error.type === "syntax") {
      console.error(error.message);
    } else {
      for (const issue of error.issues) console.error(`  ${issue}`);
    }
    return 1;
  }

  const document = buildDocument(description.data);
  const writer = new TextWriter(options.config);

  if (options.output === undefined) {
    try {
      io.stdout(writer.render(document));
    } catch (error) {
      if (error instanceof RenderError) {
        console.error(error.message);
        return 1;
      }
      throw error;
    }
    return 0;
  }

  const result = await writer.write(document, options.output, io.vfs);
  if (!result.success) {
    console.error(describeWriteError(result.error));
    return 1;
  }
  console.info(
    `Wrote ${document.structures.length} structures to ${options.output}`
  );
  return 0;
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  runCli(process.argv.slice(2), {
    vfs: new NodeVFS(),
    stdout: (text) => process.stdout.write(text),
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
