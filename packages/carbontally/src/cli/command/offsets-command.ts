import { parseArgs } from "node:util";
import process from "node:process";
import {
  buildOffsetResponse,
  calculateBaseline,
  createCalculationContext,
  recommendOffsets,
} from "@carbontally/emission-core";
import { loadSettings } from "../../config/config.js";
import { loadFactorTable } from "../../config/factors.js";
import { parsePositiveNumberFromCommand, readJsonFile } from "./command-utils.js";
import { formatOffsets } from "./report-format.js";
import { printHelp } from "./help-command.js";

//offsets --total 192
//offsets --input activity.json (total from the baseline)
export async function offsetsCommand(argv = process.argv.slice(2)) {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      factors: { type: "string" },
      input: { type: "string" },
      period: { type: "string" },
      total: { type: "string" },
      json: { type: "boolean" },
    },
  });

  if (values.help) {
    printHelp();
    return;
  }

  let footprintKg: number;
  if (values.total !== undefined) {
    footprintKg = parsePositiveNumberFromCommand("--total", values.total);
  } else if (values.input !== undefined) {
    const settings = await loadSettings({ config: values.config, factors: values.factors, period: values.period });
    const factors = await loadFactorTable(settings.factorsPath);
    const input = await readJsonFile("--input", values.input);
    footprintKg = calculateBaseline(input, createCalculationContext(factors, { period: settings.period })).totalKgCo2;
  } else {
    throw new Error("Missing footprint: use --total <kg> or --input <file.json>");
  }

  const projects = recommendOffsets(footprintKg);

  if (values.json) {
    console.log(JSON.stringify(buildOffsetResponse(footprintKg, projects), null, 2));
    return;
  }

  for (const line of formatOffsets(footprintKg, projects)) console.log(line);
}
