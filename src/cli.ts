#!/usr/bin/env node
import { realpathSync } from "node:fs";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { loadRuntimeConfig, OUTPUT_FORMATS, type OutputFormat, type RuntimeConfig } from "./config/runtime.js";
import { describeFailure, ShortestPathError } from "./errors.js";
import { loadGraphFile } from "./graph/descriptor.js";
import type { GraphModel } from "./graph/model.js";
import { StructuredLogger } from "./logger.js";
import { singleSourceGeneral } from "./paths/bellmanFord.js";
import { singleSourceNonNegative } from "./paths/dijkstra.js";
import { allPairs, distanceBetween } from "./paths/floydWarshall.js";
import { reconstructPath } from "./paths/reconstruct.js";
import {
  allPairsToJson,
  formatAllPairsPaths,
  formatDistance,
  formatDistances,
  formatMatrix,
  formatPath,
  formatSingleSourcePaths,
  singleSourceToJson,
  toJsonDistance,
} from "./report/text.js";
import { ERROR_CODES } from "./types.js";

export const ALGORITHMS = ["dijkstra", "bellman-ford", "floyd-warshall"] as const;

export type AlgorithmName = (typeof ALGORITHMS)[number];

/** Raised for malformed command lines. */
export class CliUsageError extends ShortestPathError {
  constructor(message: string) {
    super(ERROR_CODES.CLI_INVALID_ARGUMENT, message, "run with --help to list the accepted flags");
    this.name = "CliUsageError";
  }
}

interface CliOptions {
  readonly file: string;
  readonly algorithm: AlgorithmName;
  readonly format?: OutputFormat;
  readonly source?: string;
  readonly target?: string;
  readonly checkNegativeCycles: boolean;
}

interface CliDependencies {
  readonly config: RuntimeConfig;
  readonly logger: StructuredLogger;
  readonly readGraph?: (file: string) => Promise<GraphModel<string>>;
}

export interface CliOutcome {
  readonly exitCode: 0 | 1;
  readonly stdout: string[];
  readonly stderr: string[];
}

interface Report {
  readonly text: string;
  readonly json: unknown;
}

function isAlgorithm(value: string | undefined): value is AlgorithmName {
  return ALGORITHMS.some((name) => name === value);
}

function isOutputFormat(value: string | undefined): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function parseArgs(argv: readonly string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new CliUsageError("first positional argument must be the path to a JSON graph file");
  }
  let algorithm: AlgorithmName = "dijkstra";
  let format: OutputFormat | undefined;
  let source: string | undefined;
  let target: string | undefined;
  let checkNegativeCycles = false;

  const expectValue = (flag: string, index: number): string => {
    const value = rest[index];
    if (value === undefined || value.startsWith("--")) {
      throw new CliUsageError(`${flag} expects a value`);
    }
    return value;
  };

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--algorithm": {
        const value = expectValue(token, ++i);
        if (!isAlgorithm(value)) {
          throw new CliUsageError(`--algorithm must be one of ${ALGORITHMS.join(", ")}`);
        }
        algorithm = value;
        break;
      }
      case "--format": {
        const value = expectValue(token, ++i);
        if (!isOutputFormat(value)) {
          throw new CliUsageError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--source":
        source = expectValue(token, ++i);
        break;
      case "--target":
        target = expectValue(token, ++i);
        break;
      case "--check-negative-cycles":
        checkNegativeCycles = true;
        break;
      default:
        throw new CliUsageError(`unknown argument '${token}'`);
    }
  }

  return {
    file,
    algorithm,
    checkNegativeCycles,
    ...(format === undefined ? {} : { format }),
    ...(source === undefined ? {} : { source }),
    ...(target === undefined ? {} : { target }),
  };
}

function buildReport(
  graph: GraphModel<string>,
  options: CliOptions,
  config: RuntimeConfig,
  logger: StructuredLogger,
): Report {
  if (options.algorithm === "floyd-warshall") {
    const result = allPairs(graph, {
      logger,
      detectNegativeCycles: options.checkNegativeCycles || config.checkNegativeCycles,
    });
    if (options.target !== undefined) {
      if (options.source === undefined) {
        throw new CliUsageError("--target with floyd-warshall needs --source as the start vertex");
      }
      const path = reconstructPath(result, options.source, options.target);
      const distance = distanceBetween(result, options.source, options.target);
      return {
        text: [
          `Distance from ${options.source} to ${options.target}: ${formatDistance(distance)}`,
          `Path from ${options.source} to ${options.target}: ${formatPath(path)}`,
        ].join("\n"),
        json: {
          algorithm: options.algorithm,
          start: options.source,
          end: options.target,
          distance: toJsonDistance(distance),
          path,
        },
      };
    }
    return {
      text: [formatMatrix(result), formatAllPairsPaths(result)].join("\n\n"),
      json: allPairsToJson(options.algorithm, result),
    };
  }

  if (options.source === undefined) {
    throw new CliUsageError(`--source is required by ${options.algorithm}`);
  }
  const result =
    options.algorithm === "dijkstra"
      ? singleSourceNonNegative(graph, options.source, { logger })
      : singleSourceGeneral(graph, options.source, { logger });
  const targets = options.target === undefined ? undefined : [options.target];
  return {
    text: [formatDistances(result), formatSingleSourcePaths(result, targets)].join("\n\n"),
    json: singleSourceToJson(options.algorithm, result, targets),
  };
}

/**
 * Runs one invocation and collects its output instead of writing it, so the
 * test suite can drive the command line in-process.
 */
async function runCli(argv: readonly string[], dependencies: CliDependencies): Promise<CliOutcome> {
  const { config, logger } = dependencies;
  const readGraph = dependencies.readGraph ?? loadGraphFile;
  let format: OutputFormat = config.format;
  try {
    const options = parseArgs(argv);
    format = options.format ?? config.format;
    const graph = await readGraph(options.file);
    const report = buildReport(graph, options, config, logger);
    logger.info("cli_run_completed", {
      file: options.file,
      algorithm: options.algorithm,
      vertices: graph.vertexCount,
      edges: graph.edgeCount,
      format,
    });
    const output = format === "json" ? JSON.stringify(report.json, null, 2) : report.text;
    return { exitCode: 0, stdout: [output], stderr: [] };
  } catch (error) {
    const failure = describeFailure(logger, "cli_run", error, { argv: [...argv] });
    if (format === "json") {
      return { exitCode: 1, stdout: [JSON.stringify(failure, null, 2)], stderr: [] };
    }
    return { exitCode: 1, stdout: [], stderr: [`error: ${failure.message} (${failure.code})`] };
  }
}

function printUsage(): void {
  console.log(
    "Usage: shortest-paths <graph.json> [--algorithm dijkstra|bellman-ford|floyd-warshall]\n" +
      "                      [--source V] [--target V] [--format text|json] [--check-negative-cycles]\n",
  );
  console.log("Examples:");
  console.log("  shortest-paths graph.json --source A");
  console.log("  shortest-paths graph.json --algorithm bellman-ford --source A --target D");
  console.log("  shortest-paths graph.json --algorithm floyd-warshall --format json");
}

async function main(argv: string[]): Promise<void> {
  if (argv.length === 0 || argv.includes("--help")) {
    printUsage();
    process.exitCode = argv.length === 0 ? 1 : 0;
    return;
  }

  const config = loadRuntimeConfig();
  const logger = new StructuredLogger({
    minLevel: config.logLevel,
    logFile: config.logFile,
    redactionEnabled: config.logRedact,
  });
  const outcome = await runCli(argv, { config, logger });
  for (const line of outcome.stdout) {
    process.stdout.write(`${line}\n`);
  }
  for (const line of outcome.stderr) {
    process.stderr.write(`${line}\n`);
  }
  await logger.flush();
  process.exitCode = outcome.exitCode;
}

/**
 * True when {@link executedPath} designates the module at {@link moduleUrl}.
 * Both sides are resolved because npm installs `bin` entries as symlinks.
 */
function isSameModule(executedPath: string | undefined, moduleUrl: string): boolean {
  if (!executedPath) {
    return false;
  }
  try {
    return realpathSync(executedPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

const isCliEntryPoint = isSameModule(process.argv[1], import.meta.url);

if (isCliEntryPoint) {
  main(process.argv.slice(2)).catch((error) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });
}

/**
 * Internal helpers exposed to the test suite without becoming part of the
 * package's public surface.
 */
export const __testing = {
  buildReport,
  isSameModule,
  parseArgs,
  runCli,
};
