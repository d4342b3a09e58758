import { readFile } from "node:fs/promises";
import { extractErrorCode, reasonFromCode } from "@carbontally/shared";

/** -v / --verbose add one level each, -vv adds two */
export function extractVerbosity(args: string[]) {
  let level = 0;
  const rest: string[] = [];

  for (const arg of args) {
    if (arg === "--verbose" || arg === "-v") {
      level += 1;
    } else if (/^-v{2,}$/.test(arg)) {
      level += arg.length - 1;
    } else {
      rest.push(arg);
    }
  }

  return { level, rest };
}

export function parsePositiveNumberFromCommand(name: string, v: string | undefined) {
  if (v === undefined) {
    throw new Error(`${name} is required`);
  }
  const n = Number(v);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive number`);
  }
  return n;
}

/** activity payloads and breakdowns come from JSON files on the command line */
export async function readJsonFile(name: string, filePath: string | undefined): Promise<unknown> {
  if (!filePath) {
    throw new Error(`${name} <file.json> is required`);
  }

  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new Error(`${name}: cannot read ${filePath} (${reasonFromCode(extractErrorCode(error))})`, { cause: error });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`${name}: ${filePath} is not valid JSON`, { cause: error });
  }
}
