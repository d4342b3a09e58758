import type { Category } from "../calculators/categories.js";

export type CarbonTallyErrorCode = "INVALID_INPUT" | "FACTOR_NOT_FOUND";

export abstract class CarbonTallyError extends Error {
    abstract readonly code: CarbonTallyErrorCode;
}

/**
 * Caller-correctable input problem (missing mandatory field, negative value,
 * unknown transport mode or food subtype, non-positive footprint).
 */
export class InvalidInputError extends CarbonTallyError {
    readonly code = "INVALID_INPUT";
    readonly field: string;

    constructor(field: string, reason: string) {
        super(`${field}: ${reason}`);
        this.name = "InvalidInputError";
        this.field = field;
    }
}

/**
 * The factor table has no entry for a subtype the input is allowed to use.
 * Configuration data problem, not a user error.
 */
export class FactorNotFoundError extends CarbonTallyError {
    readonly code = "FACTOR_NOT_FOUND";
    readonly category: Category;
    readonly subtype: string;

    constructor(category: Category, subtype: string) {
        super(`no emission factor for ${category}/${subtype}`);
        this.name = "FactorNotFoundError";
        this.category = category;
        this.subtype = subtype;
    }
}

export function isCarbonTallyError(error: unknown): error is CarbonTallyError {
    return error instanceof CarbonTallyError;
}
