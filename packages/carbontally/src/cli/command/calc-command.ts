import { parseArgs } from "node:util";
import process from "node:process";
import {
  buildFootprintResponse,
  buildRefinedResponse,
  calculateBaseline,
  createCalculationContext,
  refine,
} from "@carbontally/emission-core";
import { loadSettings } from "../../config/config.js";
import { loadFactorTable } from "../../config/factors.js";
import { extractVerbosity, readJsonFile } from "./command-utils.js";
import { formatFactors, formatFootprint, formatRefinement } from "./report-format.js";
import { printHelp } from "./help-command.js";

export async function calcCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);

  const { values, positionals } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      factors: { type: "string" },
      input: { type: "string" },
      period: { type: "string" },
      refine: { type: "boolean" },
      json: { type: "boolean" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return;
  }

  const settings = await loadSettings({ config: values.config, factors: values.factors, period: values.period });
  const factors = await loadFactorTable(settings.factorsPath);
  const input = await readJsonFile("--input", values.input ?? positionals[0]);

  const baseline = calculateBaseline(input, createCalculationContext(factors, { period: settings.period }));
  const refined = values.refine ? refine(baseline, input) : undefined;

  if (values.json) {
    const response = refined ? buildRefinedResponse(refined) : buildFootprintResponse(baseline);
    console.log(JSON.stringify(response, null, 2));
    return;
  }

  if (verbosity >= 1) {
    console.log(`Factors: ${settings.factorsPath} (source: ${settings.sources.factorsPath.toUpperCase()}, ${factors.size} entries)`);
    console.log(`Period: ${settings.period} (source: ${settings.sources.period.toUpperCase()})`);
    console.log("");
  }

  if (verbosity >= 2) {
    for (const line of formatFactors(factors.list())) console.log(line);
    console.log("");
  }

  console.log("==============================");
  for (const line of formatFootprint(baseline, { verbose: verbosity >= 1 })) console.log(line);
  if (refined) {
    for (const line of formatRefinement(refined)) console.log(line);
  }
}
