#!/usr/bin/env node
import process from "node:process";
import { FactorNotFoundError, InvalidInputError } from "@carbontally/emission-core";
import { errorMessage } from "@carbontally/shared";
import { printHelp } from "./command/help-command.js";
import { calcCommand } from "./command/calc-command.js";
import { offsetsCommand } from "./command/offsets-command.js";
import { suggestCommand } from "./command/suggest-command.js";
import { serveCommand } from "./command/serve-command.js";

//calc --input activity.json --refine
//offsets --total 192
//serve --port 3000

const VALID_COMMANDS = new Set<string>(['calc', 'offsets', 'suggest', 'serve', 'help']);

async function main(argv: string[] = process.argv.slice(2)) {
    const [command = 'help', ...options] = argv;

    if (!VALID_COMMANDS.has(command)) {
      console.error(`[Message]: Invalid_command ${command}`);
      printHelp();
      process.exit(1);
    }

    switch (command) {
      case 'calc':
        await calcCommand(options);
        break;
      case 'offsets':
        await offsetsCommand(options);
        break;
      case 'suggest':
        await suggestCommand(options);
        break;
      case 'serve':
        await serveCommand(options);
        break;
      default:
        printHelp();
        break;
    }
}

await main().catch((err: unknown) => {
  if (err instanceof InvalidInputError) {
    console.error(`[Invalid input]: ${err.message}`);
  } else if (err instanceof FactorNotFoundError) {
    console.error(`[Unsupported]: we don't yet support this activity type (${err.category}/${err.subtype})`);
  } else {
    console.error(errorMessage(err));
  }
  process.exit(1);
});
