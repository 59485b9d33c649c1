#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { createDefaultLogger, type StructuredLogger } from "./logger.js";
import { Network, type NetworkInit } from "./network.js";
import { PHYSICS_SOLVERS, type PhysicsSolver } from "./options/physics.js";
import { omitUndefinedEntries } from "./utils/object.js";

interface CliOptions {
  readonly file: string;
  readonly out: string;
  readonly directed?: boolean;
  readonly height?: string;
  readonly width?: string;
  readonly bgcolor?: string;
  readonly heading?: string;
  readonly solver?: PhysicsSolver;
  readonly buttons: boolean;
  readonly physics: boolean;
  readonly annotate: boolean;
}

/** Raised for malformed command lines; reported with the usage text. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function isSolver(value: string): value is PhysicsSolver {
  return PHYSICS_SOLVERS.some((solver) => solver === value);
}

/** Default output: the input path with its extension replaced by `.html`. */
function defaultOutputPath(file: string): string {
  const stem = basename(file, extname(file));
  return join(dirname(file), `${stem}.html`);
}

function expectValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} expects a value`);
  }
  return value;
}

function parseArgs(argv: readonly string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new CliUsageError("First positional argument must be the path to a JSON or DOT graph file");
  }

  let out: string | undefined;
  let directed: boolean | undefined;
  let height: string | undefined;
  let width: string | undefined;
  let bgcolor: string | undefined;
  let heading: string | undefined;
  let solver: PhysicsSolver | undefined;
  let buttons = false;
  let physics = true;
  let annotate = false;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--out":
        out = expectValue(token, rest[++i]);
        break;
      case "--directed":
        directed = true;
        break;
      case "--height":
        height = expectValue(token, rest[++i]);
        break;
      case "--width":
        width = expectValue(token, rest[++i]);
        break;
      case "--bgcolor":
        bgcolor = expectValue(token, rest[++i]);
        break;
      case "--heading":
        heading = expectValue(token, rest[++i]);
        break;
      case "--solver": {
        const value = expectValue(token, rest[++i]);
        if (!isSolver(value)) {
          throw new CliUsageError(`--solver must be one of ${PHYSICS_SOLVERS.join(", ")}`);
        }
        solver = value;
        break;
      }
      case "--buttons":
        buttons = true;
        break;
      case "--no-physics":
        physics = false;
        break;
      case "--annotate":
        annotate = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument '${token ?? ""}'`);
    }
  }

  return {
    file,
    out: out ?? defaultOutputPath(file),
    buttons,
    physics,
    annotate,
    ...omitUndefinedEntries({ directed, height, width, bgcolor, heading, solver }),
  };
}

function buildNetworkInit(options: CliOptions, logger: StructuredLogger): NetworkInit {
  return {
    logger,
    ...omitUndefinedEntries({
      directed: options.directed,
      height: options.height,
      width: options.width,
      bgcolor: options.bgcolor,
      heading: options.heading,
    }),
  };
}

/**
 * Runs the CLI and returns its exit code. The graph file is a netcanvas
 * document (`{ nodes: [{ id }], edges: [{ from, to }] }`), a graphology
 * export, or DOT text when its extension is `.dot`.
 */
export async function runCli(argv: readonly string[], logger: StructuredLogger = createDefaultLogger()): Promise<number> {
  if (argv.length === 0) {
    printUsage();
    return 1;
  }

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n`);
      printUsage(process.stderr);
      return 1;
    }
    throw error;
  }

  const contents = await readFile(options.file, "utf8");
  const init = buildNetworkInit(options, logger);
  const network =
    extname(options.file).toLowerCase() === ".dot"
      ? Network.fromDot(contents, init)
      : Network.fromJson(JSON.parse(contents), init);

  if (options.solver) {
    network.options.useSolver(options.solver);
  }
  if (!options.physics) {
    network.togglePhysics(false);
  }
  if (options.buttons) {
    network.showButtons();
  }
  if (options.annotate) {
    network.annotateNeighbors();
  }

  await network.writeHtml(options.out);
  await logger.flush();
  return 0;
}

function printUsage(stream: NodeJS.WritableStream = process.stdout): void {
  stream.write(
    [
      "Usage: netcanvas <graph.json|graph.dot> [--out file.html] [--directed] [--height h] [--width w]",
      "                 [--bgcolor c] [--heading text] [--solver name] [--buttons] [--no-physics] [--annotate]",
      "",
      "Examples:",
      "  netcanvas graph.json",
      "  netcanvas graph.json --out site/graph.html --solver forceAtlas2Based --annotate",
      "  netcanvas deps.dot --heading Dependencies",
      "",
    ].join("\n"),
  );
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }
  try {
    // Installed binaries are symlinks, so compare resolved paths.
    return realpathSync(executedFromCli) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
})();

if (isCliEntryPoint) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    });
}

/** Internal helpers exposed to the test suite. */
export const __testing = {
  parseArgs,
  defaultOutputPath,
};
