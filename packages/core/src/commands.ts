import { loadConfig, parseIntStrict } from "./config.js";
import { decode } from "./decoder.js";
import { encode } from "./encoder.js";
import { TokenGridError } from "./errors.js";
import { formatGrid } from "./format.js";
import { logError, setLogLevel } from "./logger.js";
import { gridToRows, parseRows } from "./rows.js";

/** Where the CLI reads and writes; swapped out in tests. */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): string;
  env: Record<string, string | undefined>;
}

export const USAGE = `
tokengrid — Hide a short message in a password-keyed grid of tokens

Usage:
  tokengrid --encode <text> -p <password>      Print the grid, one row per line
  tokengrid --decode -p <password> --lines <row>...
  tokengrid --decode -p <password> --stdin     Read rows from stdin, one per line

Options:
  -p, --password <pw>  Shared password (required)
  --line-max <n>       Tokens per row when encoding (default: 10)
  --total-max <n>      Total token slots when encoding (default: 30)
  --seed <seed>        Reproducible encode from a number or string seed
  --print              Also pretty-print the grid before the rows
  --verbose            Log pipeline events to stderr
  -h, --help           Show this help

Environment:
  TOKENGRID_LINE_MAX, TOKENGRID_TOTAL_MAX, TOKENGRID_MAX_ATTEMPTS,
  TOKENGRID_LOG_LEVEL (debug | info | warn | error | silent)
`;

const KNOWN_FLAGS = new Set([
  "--encode",
  "--decode",
  "-p",
  "--password",
  "--line-max",
  "--total-max",
  "--seed",
  "--print",
  "--verbose",
  "--lines",
  "--stdin",
  "-h",
  "--help",
]);

/** Run the CLI and return its exit code. */
export function runCli(args: readonly string[], io: CliIO): number {
  if (args.length === 0 || args.includes("-h") || args.includes("--help")) {
    io.stdout(USAGE);
    return 0;
  }

  try {
    const config = loadConfig(io.env);
    setLogLevel(args.includes("--verbose") ? "debug" : config.logLevel);

    const password = flagValue(args, "-p") ?? flagValue(args, "--password");
    if (password === undefined) {
      io.stderr("Error: --password is required");
      return 1;
    }

    const encodeIdx = args.indexOf("--encode");
    const decoding = args.includes("--decode");
    if ((encodeIdx === -1) === !decoding) {
      io.stderr("Error: give exactly one of --encode <text> or --decode");
      return 1;
    }

    if (encodeIdx !== -1) {
      const text = flagValue(args, "--encode");
      if (text === undefined) {
        io.stderr("Usage: tokengrid --encode <text> -p <password>");
        return 1;
      }
      const lineMax = flagValue(args, "--line-max");
      const totalMax = flagValue(args, "--total-max");
      const grid = encode(text, password, {
        lineMax: lineMax !== undefined ? parseIntStrict("--line-max", lineMax) : config.lineMax,
        totalMax: totalMax !== undefined ? parseIntStrict("--total-max", totalMax) : config.totalMax,
        maxAttempts: config.maxAttempts,
        seed: flagValue(args, "--seed"),
      });
      if (args.includes("--print")) io.stdout(formatGrid(grid));
      io.stdout(gridToRows(grid).join("\n"));
      return 0;
    }

    const rows = args.includes("--stdin")
      ? io.readStdin().split(/\r?\n/).filter((l) => l.length > 0)
      : linesArgs(args);
    if (rows.length === 0) {
      io.stderr("Error: --lines or --stdin must be provided for decode");
      return 1;
    }
    io.stdout(decode(parseRows(rows), password));
    return 0;
  } catch (err) {
    if (err instanceof TokenGridError) {
      logError("cli_error", "Command failed", err, { code: err.code });
      io.stderr(`[tokengrid] error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

function flagValue(args: readonly string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

/** Every argument after --lines up to the next flag. */
function linesArgs(args: readonly string[]): string[] {
  const idx = args.indexOf("--lines");
  if (idx === -1) return [];
  const rows: string[] = [];
  for (let i = idx + 1; i < args.length && !KNOWN_FLAGS.has(args[i]); i++) {
    rows.push(args[i]);
  }
  return rows;
}
