import { parseArgs } from "node:util";
import { writeFile } from "node:fs/promises";
import {
  ACTIVITIES,
  FactorTableCache,
  formatIntensity,
  isBreakdown,
  toCsv,
  type ActivityKey,
  type ActivityQuantities,
  type Breakdown,
} from "@clinic-carbon/emission-core";
import { createLogger, levelFromVerbosity } from "@clinic-carbon/shared";
import { resolveSettings } from "../../config/settings.js";
import { loadFactorsFile } from "../../calculation/factors.js";
import { runCalculation, type CalculationReport } from "../../calculation/runCalculation.js";
import { extractVerbosity, parseNonNegativeNumberFromCommand, parseRegionFromCommand, withArgumentErrors } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export const QUANTITY_FLAGS = {
  electricity_kWh: "electricity-kwh",
  petrol_L: "petrol-l",
  diesel_L: "diesel-l",
  lpg_L: "lpg-l",
  natural_gas_MJ: "natural-gas-mj",
  isoflurane_g: "isoflurane-g",
  sevoflurane_g: "sevoflurane-g",
  desflurane_g: "desflurane-g",
  n2o_g: "n2o-g",
} as const satisfies Record<ActivityKey, string>;

export function parseCalculateArgs(argv: string[]) {
  const { level: verbosity, rest } = extractVerbosity(argv);

  const { values } = withArgumentErrors(() => parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      factors: { type: "string" },

      region: { type: "string" },
      fte: { type: "string" },
      name: { type: "string" },
      year: { type: "string" },

      "electricity-kwh": { type: "string" },
      "petrol-l": { type: "string" },
      "diesel-l": { type: "string" },
      "lpg-l": { type: "string" },
      "natural-gas-mj": { type: "string" },

      anaesthetics: { type: "boolean" },
      "isoflurane-g": { type: "string" },
      "sevoflurane-g": { type: "string" },
      "desflurane-g": { type: "string" },
      "n2o-g": { type: "string" },

      breakdown: { type: "string" },
      json: { type: "boolean" },
      csv: { type: "boolean" },
      out: { type: "string" },
    },
  }));

  const quantities: ActivityQuantities = {};
  for (const activity of ACTIVITIES) {
    const flag = QUANTITY_FLAGS[activity.key];
    const raw = values[flag];
    if (raw === undefined) continue;
    quantities[activity.key] = parseNonNegativeNumberFromCommand(`--${flag}`, raw, 0);
  }

  let breakdown: Breakdown | undefined;
  if (values.breakdown !== undefined) {
    if (!isBreakdown(values.breakdown)) {
      throw new Error("--breakdown must be one of groups, combined, lines");
    }
    breakdown = values.breakdown;
  }

  if (values.json && values.csv) {
    throw new Error("Use either --json or --csv (or none)");
  }

  return {
    help: !!values.help,
    verbosity,
    configPath: values.config,
    factorsPath: values.factors,
    region: parseRegionFromCommand("--region", values.region),
    fte: parseNonNegativeNumberFromCommand("--fte", values.fte, 0),
    facility: values.name !== undefined || values.year !== undefined
      ? { name: values.name, reportingYear: values.year }
      : undefined,
    quantities,
    // undefined: fall back to the config default
    includeAnaesthetics: values.anaesthetics ? true : undefined,
    breakdown,
    json: !!values.json,
    csv: !!values.csv,
    out: values.out,
  };
}

function kg(value: number) {
  return `${value.toFixed(2)} kgCO2e`;
}

function printReport(report: CalculationReport, verbosity: number) {
  const { facility, result, metrics } = report;

  console.log("\nFacility Emissions (Scope 1 & 2)");
  console.log("\n--------------------------\n");
  if (facility?.name) console.log(`Facility: ${facility.name}`);
  if (facility?.reportingYear) console.log(`Reporting year: ${facility.reportingYear}`);
  console.log(`Region: ${result.region}`);
  console.log(`FTE: ${result.fte}`);
  console.log(`Anaesthetic gases: ${result.includesAnaesthetics ? "included" : "excluded"}`);
  console.log("\n----------RESULTS---------\n");
  for (const row of metrics.rows) {
    console.log(`${row.metric}: ${kg(row.kgCO2e)}`);
  }
  console.log(`Intensity (kgCO2e per FTE): ${formatIntensity(result.intensity)}`);

  if (verbosity >= 1) {
    console.log("\n----------FACTORS---------\n");
    for (const line of result.lines) {
      const where = line.state ? ` ${line.state}` : "";
      console.log(`${line.label}${where}: ${line.quantity} ${line.unit} x ${line.factor} = ${kg(line.kgCO2e)} [${line.source} ${line.sourceYear}]`);
    }
  }
  console.log("\n--------------------------\n");
  console.log("Emission factors: location-based. Verify factors and units before use.");

  if (verbosity >= 2) {
    console.log("\nRaw result:");
    console.log(JSON.stringify(result, null, 2));
  }
}

export async function calculateCommand(argv = process.argv.slice(2)) {
  const args = parseCalculateArgs(argv);

  if (args.help) {
    printHelp();
    return;
  }

  const settings = await resolveSettings(args.configPath, {
    factorsPath: args.factorsPath,
    region: args.region,
    includeAnaesthetics: args.includeAnaesthetics,
  });
  const logger = createLogger({ level: levelFromVerbosity(args.verbosity, settings.logLevel) });

  const cache = new FactorTableCache({ maxEntries: settings.cacheEntries });
  const table = await loadFactorsFile(settings.factorsPath, cache, logger);

  const report = runCalculation(table, {
    region: settings.region,
    fte: args.fte,
    quantities: args.quantities,
    facility: args.facility,
  }, {
    includeAnaesthetics: settings.includeAnaesthetics,
    breakdown: args.breakdown,
    logger,
  });

  if (args.out) {
    await writeFile(args.out, `${toCsv(report.metrics)}\n`, "utf-8");
    logger.info({ file: args.out }, "results written");
  }

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  if (args.csv) {
    console.log(toCsv(report.metrics));
    return;
  }

  printReport(report, args.verbosity);
}
