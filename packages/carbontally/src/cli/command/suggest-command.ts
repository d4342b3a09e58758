import { parseArgs } from "node:util";
import process from "node:process";
import {
  buildSuggestionsResponse,
  calculateBaseline,
  createCalculationContext,
  rankSuggestions,
} from "@carbontally/emission-core";
import { loadSettings } from "../../config/config.js";
import { loadFactorTable } from "../../config/factors.js";
import { readJsonFile } from "./command-utils.js";
import { formatSuggestions } from "./report-format.js";
import { printHelp } from "./help-command.js";

export async function suggestCommand(argv = process.argv.slice(2)) {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      factors: { type: "string" },
      input: { type: "string" },
      breakdown: { type: "string" },
      period: { type: "string" },
      json: { type: "boolean" },
    },
  });

  if (values.help) {
    printHelp();
    return;
  }

  let breakdown: unknown;
  if (values.breakdown !== undefined) {
    breakdown = await readJsonFile("--breakdown", values.breakdown);
  } else {
    const settings = await loadSettings({ config: values.config, factors: values.factors, period: values.period });
    const factors = await loadFactorTable(settings.factorsPath);
    const input = await readJsonFile("--input", values.input);
    breakdown = calculateBaseline(input, createCalculationContext(factors, { period: settings.period })).breakdown;
  }

  const suggestions = rankSuggestions(breakdown);

  if (values.json) {
    console.log(JSON.stringify(buildSuggestionsResponse(suggestions), null, 2));
    return;
  }

  for (const line of formatSuggestions(suggestions)) console.log(line);
}
