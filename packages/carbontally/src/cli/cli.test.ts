import test, { before, after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import process from "node:process";
import { calculateBaseline, recommendOffsets, rankSuggestions, refine } from "@carbontally/emission-core";
import { extractVerbosity, parsePositiveNumberFromCommand, readJsonFile } from "./command/command-utils.js";
import { formatFactors, formatFootprint, formatKg, formatOffsets, formatRefinement, formatSuggestions } from "./command/report-format.js";
import { FIXED_TIMESTAMP, SAMPLE_INPUT, testContext, testFactorTable, writeJsonFile } from "../../../../utils/test-utils.js";

const tmpRoot = path.join(os.tmpdir(), `carbontally-cli-tests-${process.pid}`);

before(async () => {
  await fs.rm(tmpRoot, { recursive: true, force: true });
  await fs.mkdir(tmpRoot, { recursive: true });
});

after(async () => {
  await fs.rm(tmpRoot, { recursive: true, force: true });
});

test("extractVerbosity counts -v, -vv and --verbose", () => {
  const rest = ["--input", "activity.json", "--refine"];
  assert.deepStrictEqual(extractVerbosity(["--input", "activity.json", "--refine"]), { level: 0, rest });
  assert.deepStrictEqual(extractVerbosity(["--input", "activity.json", "--refine", "--verbose"]), { level: 1, rest });
  assert.deepStrictEqual(extractVerbosity(["-v", "--input", "activity.json", "--refine"]), { level: 1, rest });
  assert.deepStrictEqual(extractVerbosity(["--input", "activity.json", "-vv", "--refine"]), { level: 2, rest });
  assert.deepStrictEqual(extractVerbosity(["-v", "--input", "activity.json", "--refine", "-v"]), { level: 2, rest });
});

test("extractVerbosity leaves unknown flags for parseArgs", () => {
  assert.deepStrictEqual(extractVerbosity(["--input", "a.json", "--debug-meta"]), {
    level: 0,
    rest: ["--input", "a.json", "--debug-meta"],
  });
});

test("parsePositiveNumberFromCommand", () => {
  assert.equal(parsePositiveNumberFromCommand("--total", "192"), 192);
  assert.equal(parsePositiveNumberFromCommand("--total", "0.5"), 0.5);
  assert.throws(() => parsePositiveNumberFromCommand("--total", undefined), { message: "--total is required" });
  assert.throws(() => parsePositiveNumberFromCommand("--total", "0"), { message: "--total must be a positive number" });
  assert.throws(() => parsePositiveNumberFromCommand("--total", "-5"), { message: "--total must be a positive number" });
  assert.throws(() => parsePositiveNumberFromCommand("--total", "lots"), { message: "--total must be a positive number" });
});

test("readJsonFile parses an activity file", async () => {
  const file = await writeJsonFile(tmpRoot, "activity.json", SAMPLE_INPUT);
  assert.deepStrictEqual(await readJsonFile("--input", file), SAMPLE_INPUT);
});

test("readJsonFile reports missing and malformed files", async () => {
  await assert.rejects(readJsonFile("--input", undefined), { message: "--input <file.json> is required" });

  const missing = path.join(tmpRoot, "missing.json");
  await assert.rejects(readJsonFile("--input", missing), {
    message: `--input: cannot read ${missing} (file_not_found)`,
  });

  const malformed = path.join(tmpRoot, "malformed.json");
  await fs.writeFile(malformed, "{ commute_km: 20 }");
  await assert.rejects(readJsonFile("--input", malformed), {
    message: `--input: ${malformed} is not valid JSON`,
  });
});

test("formatFootprint lists every category and the total", () => {
  const result = calculateBaseline(SAMPLE_INPUT, testContext());
  assert.deepStrictEqual(formatFootprint(result), [
    "Carbon Footprint (baseline)",
    "--------------------------",
    "Period: as-reported",
    `Computed at: ${FIXED_TIMESTAMP}`,
    "",
    "Transport: 26.60 kg CO2",
    "Food: 30.00 kg CO2",
    "Energy: 135.00 kg CO2",
    "Waste: 0.40 kg CO2",
    "Consumption: 0.00 kg CO2",
    "--------------------------",
    "Total: 192.00 kg CO2",
  ]);
});

test("formatFootprint shows details when verbose", () => {
  const lines = formatFootprint(calculateBaseline(SAMPLE_INPUT, testContext()), { verbose: true });
  assert.deepStrictEqual(lines.slice(5, 12), [
    "Transport: 26.60 kg CO2",
    "  commute: 26.60 kg CO2",
    "  mode: car_petrol",
    "  distance_km: 20 km/day",
    "Food: 30.00 kg CO2",
    "  beef: 30.00 kg CO2",
    "Energy: 135.00 kg CO2",
  ]);
});

test("formatRefinement lists changed categories and insights", () => {
  const input = { ...SAMPLE_INPUT, house_size: 120, occupants: 2 };
  const refined = refine(calculateBaseline(input, testContext()), input);
  assert.deepStrictEqual(formatRefinement(refined), [
    "",
    "Refined estimate",
    "--------------------------",
    "Energy: 175.50 kg CO2 (+40.50)",
    "Refined total: 232.50 kg CO2",
    "",
    "Insights:",
    "- Dwelling density: 120 m² for 2 occupants is 1.50x the 40 m²/person reference; energy x1.300 (+40.50 kg CO2)",
  ]);
});

test("formatRefinement without context", () => {
  const refined = refine(calculateBaseline(SAMPLE_INPUT, testContext()), SAMPLE_INPUT);
  assert.deepStrictEqual(formatRefinement(refined).slice(3), [
    "Refined total: 192.00 kg CO2",
    "No contextual data: refined estimate equals the baseline.",
  ]);
});

test("formatOffsets prints one block per project", () => {
  const lines = formatOffsets(192, recommendOffsets(192));
  assert.equal(lines.length, 2 + 3 * 4);
  assert.equal(lines[0], "Offset options for 192.00 kg CO2");
  assert.deepStrictEqual(lines.slice(2, 5), [
    "Amazon Rainforest Reforestation [Reforestation]",
    "  Plant trees to offset 192.0 kg of CO2 emissions",
    "  15 USD/t, total 2.88 USD",
  ]);
  assert.match(lines[5] ?? "", /^ {2}ref CERT-[0-9A-F]{16}$/);
});

test("formatSuggestions", () => {
  assert.deepStrictEqual(formatSuggestions([]), ["No category stands out: nothing to suggest."]);
  assert.deepStrictEqual(
    formatSuggestions(rankSuggestions({ transport: 40, food: 60, energy: 0, waste: 0, consumption: 0 })),
    [
      "1. Food accounts for 60.0% of your footprint. Swapping some red meat for poultry, fish or plant proteins has the largest effect.",
      "2. Transport accounts for 40.0% of your footprint. Try car-pooling, public transport or cycling for part of your commute.",
    ]
  );
});

test("formatFactors lists the table in category order", () => {
  const lines = formatFactors(testFactorTable().list());
  assert.equal(lines.length, 2 + 21);
  assert.deepStrictEqual(lines.slice(0, 3), [
    "Emission factors",
    "--------------------------",
    "transport/car_petrol: 0.19 kg CO2/km (test)",
  ]);
  assert.equal(lines[lines.length - 1], "consumption/electronics_item: 70 kg CO2/item (test)");
});

test("formatKg", () => {
  assert.equal(formatKg(0), "0.00 kg CO2");
  assert.equal(formatKg(1234.567), "1234.57 kg CO2");
});
