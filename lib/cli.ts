/**
 * Command-line front end for the interpreter.
 *
 * Usage:
 *   lime [OPTIONS] <program.lime>
 *
 * The process-facing pieces (file system, streams, colours) are passed in as
 * a {@link CliIO} so the whole command can run in-process.
 *
 * @module
 */
import type { LineReader, LineWriter } from "./io/lineIo.js";
import { Interpreter } from "./interpreter.js";
import { VERSION } from "./shared/version.js";

export interface CliIO {
  readFile(path: string): string;
  input: LineReader;
  output: LineWriter;
  /** Writes one error line to the error stream. */
  reportError(message: string): void;
}

export interface CLIOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  continueOnError: boolean;
  maxDepth: number | undefined;
}

export class UsageError extends Error {}

export function parseArgs(
  args: string[],
): { options: CLIOptions; inputPath?: string } {
  const options: CLIOptions = {
    help: false,
    version: false,
    verbose: false,
    continueOnError: false,
    maxDepth: undefined,
  };

  let inputPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--verbose":
      case "-V":
        options.verbose = true;
        break;
      case "--continue":
      case "-k":
        options.continueOnError = true;
        break;
      case "--max-depth":
      case "-d": {
        const value = args[++i];
        const depth = Number(value);
        if (value === undefined || !Number.isInteger(depth) || depth <= 0) {
          throw new UsageError(`${arg} requires a positive integer`);
        }
        options.maxDepth = depth;
        break;
      }
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (inputPath !== undefined) {
          throw new UsageError("lime requires exactly one argument: a file name");
        }
        inputPath = arg;
        break;
    }
  }

  return { options, inputPath };
}

const HELP = `
Lime interpreter v${VERSION}

USAGE:
    lime [OPTIONS] <program.lime>

OPTIONS:
    -h, --help           Show this help message
    -v, --version        Show version information
    -V, --verbose        Write diagnostics to standard error
    -k, --continue       Report a failing line and keep going
    -d, --max-depth N    Fail once evaluation nests deeper than N

DESCRIPTION:
    Runs a Lime program one line at a time. The value of every expression
    line is printed; bindings (name := expr) are not.
`;

/**
 * Runs the command with the given arguments.
 *
 * @returns the process exit code
 */
export function runCli(args: string[], io: CliIO): number {
  let parsed: ReturnType<typeof parseArgs>;
  try {
    parsed = parseArgs(args);
  } catch (e) {
    if (e instanceof UsageError) {
      io.reportError(e.message);
      io.reportError("Use --help for usage information.");
      return 1;
    }
    throw e;
  }

  const { options, inputPath } = parsed;

  if (options.help) {
    io.output.writeLine(HELP.trim());
    return 0;
  }
  if (options.version) {
    io.output.writeLine(`lime v${VERSION}`);
    return 0;
  }
  if (inputPath === undefined) {
    io.reportError("lime requires exactly one argument: a file name");
    return 1;
  }

  let source: string;
  try {
    source = io.readFile(inputPath);
  } catch {
    io.reportError(`unable to open file: \`${inputPath}\``);
    return 1;
  }

  if (options.verbose) {
    console.error(`[DEBUG] loaded ${inputPath} (${source.length} chars)`);
  }

  const interpreter = new Interpreter({
    input: io.input,
    output: io.output,
    maxDepth: options.maxDepth,
    continueOnError: options.continueOnError,
    verbose: options.verbose,
    onError: (error) => io.reportError(error.describe()),
  });

  const { errors } = interpreter.run(source);
  return errors.length === 0 ? 0 : 1;
}
