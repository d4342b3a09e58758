import { parseArgs } from "node:util";
import process from "node:process";
import type { FastifyBaseLogger } from "fastify";
import { FactorRegistry } from "@carbontally/emission-core";
import { errorMessage } from "@carbontally/shared";
import { loadSettings } from "../../config/config.js";
import { loadFactorTable } from "../../config/factors.js";
import { buildServer } from "../../server/server.js";
import { printHelp } from "./help-command.js";

async function reloadFactors(log: FastifyBaseLogger, registry: FactorRegistry, factorsPath: string) {
  try {
    const generation = registry.replace(await loadFactorTable(factorsPath));
    log.info({ generation, factorsPath }, "emission factors reloaded");
  } catch (error) {
    // the previous table stays in place
    log.error({ factorsPath, reason: errorMessage(error) }, "emission factor reload failed");
  }
}

export async function serveCommand(argv = process.argv.slice(2)) {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      factors: { type: "string" },
      period: { type: "string" },
      host: { type: "string" },
      port: { type: "string" },
      "log-level": { type: "string" },
    },
  });

  if (values.help) {
    printHelp();
    return;
  }

  const settings = await loadSettings({
    config: values.config,
    factors: values.factors,
    period: values.period,
    host: values.host,
    port: values.port,
    logLevel: values["log-level"],
  });

  const registry = new FactorRegistry(await loadFactorTable(settings.factorsPath));
  const app = await buildServer({ registry, period: settings.period, logger: { level: settings.logLevel } });

  process.on("SIGHUP", () => {
    void reloadFactors(app.log, registry, settings.factorsPath);
  });

  process.once("SIGINT", () => {
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(errorMessage(error));
        process.exit(1);
      }
    );
  });

  await app.listen({ host: settings.host, port: settings.port });
}
