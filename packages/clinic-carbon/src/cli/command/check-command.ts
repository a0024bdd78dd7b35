import { parseArgs } from "node:util";
import { checkFactorCoverage, FactorTableCache, type CoverageEntry } from "@clinic-carbon/emission-core";
import { createLogger, levelFromVerbosity } from "@clinic-carbon/shared";
import { resolveSettings } from "../../config/settings.js";
import { loadFactorsFile } from "../../calculation/factors.js";
import { extractVerbosity, parseRegionFromCommand, withArgumentErrors } from "./command-utils.js";
import { printHelp } from "./help-command.js";

function describe(entry: CoverageEntry) {
  const key = [entry.category, entry.subcategory ?? "-", entry.state ?? "-"].join("/");
  switch (entry.status) {
    case "ok":
      return `OK       ${key} = ${entry.factor}`;
    case "not_found":
      return `MISSING  ${key}`;
    case "invalid_factor":
      return `INVALID  ${key} (factor '${entry.rawValue ?? ""}')`;
  }
}

/**
 * Resolve every factor a calculation can request.
 * Throws when at least one is missing or not numeric.
 */
export async function checkCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);
  const { values } = withArgumentErrors(() => parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      factors: { type: "string" },
      region: { type: "string" },
      anaesthetics: { type: "boolean" },
    },
  }));

  if (values.help) {
    printHelp();
    return;
  }

  const region = parseRegionFromCommand("--region", values.region);
  const settings = await resolveSettings(values.config, {
    factorsPath: values.factors,
    includeAnaesthetics: values.anaesthetics ? true : undefined,
  });
  const logger = createLogger({ level: levelFromVerbosity(verbosity, settings.logLevel) });

  const table = await loadFactorsFile(settings.factorsPath, new FactorTableCache(), logger);
  const entries = checkFactorCoverage(table, {
    regions: region ? [region] : undefined,
    includeAnaesthetics: settings.includeAnaesthetics,
  });

  console.log(`Factor table: ${settings.factorsPath} (${table.size} rows)\n`);
  for (const entry of entries) {
    console.log(describe(entry));
  }

  const failed = entries.filter((entry) => entry.status !== "ok").length;
  if (failed > 0) {
    throw new Error(`${failed} of ${entries.length} factor(s) missing or invalid`);
  }
  console.log(`\nAll ${entries.length} factors resolved.`);
}
