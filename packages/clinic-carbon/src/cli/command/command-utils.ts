import { isEmissionDataError, isRegion, REGIONS, type Region } from "@clinic-carbon/emission-core";
import { extractErrorCode } from "@clinic-carbon/shared";

/**
 * level : 0 | 1 | 2
 * 0 === default log level
 * 1 === --verbose ou -v (debug logs, factor provenance)
 * 2 === -vv (same, plus the raw result as JSON)
 */
export function extractVerbosity(args: string[]) {
  let level = 0;
  const rest: string[] = [];

  for (const arg of args) {
    if (arg === "--verbose" || arg === "-v") {
      level += 1;
      continue;
    }

    if (/^-v{2,}$/.test(arg)) {
      level += arg.length - 1; // -vv
      continue;
    }

    rest.push(arg);
  }

  return { level, rest };
}

export function parseNonNegativeNumberFromCommand(name: string, v: string | undefined, fallback: number) {
  if (v === undefined) return fallback;
  const n = v.trim() === "" ? Number.NaN : Number(v);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`${name} must be a non-negative number`);
  }
  return n;
}

export function parsePortFromCommand(name: string, v: string | undefined): number | undefined {
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0 || n > 65535) {
    throw new Error(`${name} must be a port number (0-65535)`);
  }
  return n;
}

export function parseRegionFromCommand(name: string, v: string | undefined): Region | undefined {
  if (v === undefined) return undefined;
  const region = v.toUpperCase();
  if (!isRegion(region)) {
    throw new Error(`${name} must be one of ${REGIONS.join(", ")}`);
  }
  return region;
}

/**
 * Run a `parseArgs` call, turning its `ERR_PARSE_ARGS_*` errors
 * (unknown option, `--diesel-l -4` read as an option) into one-line messages.
 */
export function withArgumentErrors<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    const code = extractErrorCode(error);
    if (error instanceof Error && code?.startsWith("ERR_PARSE_ARGS_")) {
      throw new Error(`[arguments] ${error.message.replace(/\s*\n\s*/g, " ")}`, { cause: error });
    }
    throw error;
  }
}

export function formatCommandError(error: unknown): string {
  if (isEmissionDataError(error)) {
    return `[${error.kind}] ${error.message}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return message.startsWith("[") ? message : `[error] ${message}`;
}
