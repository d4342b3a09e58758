import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { FactorTable } from "@carbontally/emission-core";
import { extractErrorCode, reasonFromCode } from "@carbontally/shared";

/** factor resource shipped with the package (data/ sits next to src/ and dist/) */
export const DEFAULT_FACTORS_PATH = fileURLToPath(new URL("../../data/emission_factors.json", import.meta.url));

/**
 * Read and validate a factor resource. Always returns a fresh table; callers
 * swap it in whole (FactorRegistry.replace), never merge.
 */
export async function loadFactorTable(factorsPath: string = DEFAULT_FACTORS_PATH): Promise<FactorTable> {
    let raw: string;
    try {
        raw = await readFile(factorsPath, "utf-8");
    } catch (error) {
        throw new Error(`[factors]: cannot read ${factorsPath} (${reasonFromCode(extractErrorCode(error))})`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new Error(`[factors]: ${factorsPath} is not valid JSON`, { cause: error });
    }
    return FactorTable.fromSource(parsed);
}
