import { parseArgs } from "node:util";
import { FactorTableCache } from "@clinic-carbon/emission-core";
import { createLogger, levelFromVerbosity } from "@clinic-carbon/shared";
import { resolveSettings } from "../../config/settings.js";
import { loadFactorsFile } from "../../calculation/factors.js";
import { buildServer } from "../../server/server.js";
import { extractVerbosity, parsePortFromCommand, withArgumentErrors } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function serveCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);
  const { values } = withArgumentErrors(() => parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      factors: { type: "string" },
      host: { type: "string" },
      port: { type: "string" },
    },
  }));

  if (values.help) {
    printHelp();
    return;
  }

  const settings = await resolveSettings(values.config, {
    factorsPath: values.factors,
    host: values.host,
    port: parsePortFromCommand("--port", values.port),
  });
  const logger = createLogger({ level: levelFromVerbosity(verbosity, settings.logLevel) });

  const cache = new FactorTableCache({ maxEntries: settings.cacheEntries });
  const factors = await loadFactorsFile(settings.factorsPath, cache, logger);

  const app = await buildServer({
    logger,
    factors,
    cache,
    defaults: { region: settings.region, includeAnaesthetics: settings.includeAnaesthetics },
  });

  process.once('SIGINT', async () => {
    logger.info('Gracefully shutting down…');
    try {
      await app.close();
    } catch (error) {
      logger.error(error, 'Error closing HTTP server');
      process.exit(1);
    }
    process.exit(0); // 0 = success, so no ELIFECYCLE error
  });

  await app.listen({ host: settings.host, port: settings.port });
}
