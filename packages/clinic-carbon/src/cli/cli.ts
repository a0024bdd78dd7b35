#!/usr/bin/env -S node --import tsx
import process from "node:process";
import { formatCommandError } from "./command/command-utils.js";
import { printHelp } from "./command/help-command.js";
import { calculateCommand } from "./command/calculate-command.js";
import { checkCommand } from "./command/check-command.js";
import { serveCommand } from "./command/serve-command.js";

//calculate --region VIC --fte 12 --electricity-kwh 18000 --petrol-l 400 -v
//calculate --anaesthetics --isoflurane-g 250 --factors ./my_factors.csv --csv

const VALID_COMMANDS = new Set(['calculate', 'check', 'serve', 'help']);

async function main(argv: string[] = process.argv.slice(2)) {
    const [command = 'help', ...options] = argv;

    if (!VALID_COMMANDS.has(command)) {
      console.error(`[Message]: Invalid_command ${command}`);
      printHelp();
      process.exitCode = 1;
      return;
    }

    switch (command) {
      case 'calculate':
        await calculateCommand(options);
        break;
      case 'check':
        await checkCommand(options);
        break;
      case 'serve':
        await serveCommand(options);
        break;
      default:
        printHelp();
        break;
    }
}

await main().catch((error: unknown) => {
  console.error(formatCommandError(error));
  process.exit(1);
});
