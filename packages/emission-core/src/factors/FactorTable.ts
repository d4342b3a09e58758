import { CATEGORY_ORDER, type Category, isCategory } from "../calculators/categories.js";
import { FactorNotFoundError } from "../errors/errors.js";

export interface FactorEntrySource {
    unit: string;
    factor: number; // kg CO2e per unit
    source: string;
}

/**
 * Shape of the external factor resource:
 * category -> subtype -> { unit, factor, source }
 */
export type FactorTableSource = Partial<Record<Category, Record<string, FactorEntrySource>>>;

export interface EmissionFactor {
    readonly category: Category;
    readonly subtype: string;
    readonly unit: string;
    readonly kgCo2PerUnit: number;
    readonly source: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function keyOf(category: Category, subtype: string) {
    return `${category}/${subtype}`;
}

function parseEntry(category: Category, subtype: string, raw: unknown): EmissionFactor {
    const where = `factor table: ${category}/${subtype}`;
    if (!isRecord(raw)) {
        throw new Error(`${where} must be an object`);
    }
    const { unit, factor, source } = raw;
    if (typeof unit !== "string" || unit.length === 0) {
        throw new Error(`${where}.unit must be a non-empty string`);
    }
    if (typeof factor !== "number" || !Number.isFinite(factor) || factor < 0) {
        throw new Error(`${where}.factor must be a finite number >= 0`);
    }
    if (typeof source !== "string") {
        throw new Error(`${where}.source must be a string`);
    }
    return Object.freeze({ category, subtype, unit, kgCo2PerUnit: factor, source });
}

/**
 * Immutable emission factor lookup. Built once, never patched: a new factor
 * set means a new table (see FactorRegistry).
 */
export class FactorTable {
    private readonly entries: ReadonlyMap<string, EmissionFactor>;

    private constructor(entries: Map<string, EmissionFactor>) {
        this.entries = entries;
        Object.freeze(this);
    }

    static fromSource(source: unknown): FactorTable {
        if (!isRecord(source)) {
            throw new Error("factor table: invalid JSON object");
        }
        const entries = new Map<string, EmissionFactor>();
        for (const [category, subtypes] of Object.entries(source)) {
            if (!isCategory(category)) {
                throw new Error(`factor table: unknown category "${category}"`);
            }
            if (!isRecord(subtypes)) {
                throw new Error(`factor table: ${category} must map subtypes to factors`);
            }
            for (const [subtype, raw] of Object.entries(subtypes)) {
                entries.set(keyOf(category, subtype), parseEntry(category, subtype, raw));
            }
        }
        return new FactorTable(entries);
    }

    get size(): number {
        return this.entries.size;
    }

    has(category: Category, subtype: string): boolean {
        return this.entries.has(keyOf(category, subtype));
    }

    /**
     * A miss is an error, never a zero: zero is reserved for activities that
     * really emit nothing (walking, bicycle).
     */
    lookup(category: Category, subtype: string): EmissionFactor {
        const factor = this.entries.get(keyOf(category, subtype));
        if (!factor) {
            throw new FactorNotFoundError(category, subtype);
        }
        return factor;
    }

    /** factors in category declaration order */
    list(): EmissionFactor[] {
        const all = [...this.entries.values()];
        return CATEGORY_ORDER.flatMap((category) => all.filter((f) => f.category === category));
    }
}
