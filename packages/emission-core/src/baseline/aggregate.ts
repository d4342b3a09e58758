import { type Breakdown, CATEGORY_ORDER, type Category, type CategoryResult, type DetailMap } from "../calculators/categories.js";
import type { ReportingPeriod } from "../calculators/period.js";
import { InvalidInputError } from "../errors/errors.js";

export interface FootprintResult {
    readonly breakdown: Readonly<Breakdown>;
    readonly totalKgCo2: number;
    readonly details: Readonly<Record<Category, DetailMap>>;
    readonly period: ReportingPeriod;
    readonly timestamp: string;
}

export interface AggregateOptions {
    period: ReportingPeriod;
    timestamp: string;
}

function indexByCategory(results: readonly CategoryResult[]): Map<Category, CategoryResult> {
    const byCategory = new Map<Category, CategoryResult>();
    for (const result of results) {
        if (byCategory.has(result.category)) {
            throw new InvalidInputError(result.category, "more than one result for this category");
        }
        byCategory.set(result.category, result);
    }
    return byCategory;
}

/**
 * Sum category subtotals into a footprint.
 * Accumulates in CATEGORY_ORDER whatever order `results` arrive in, so the
 * total is byte-reproducible. Zero subtotals keep their breakdown entry.
 */
export function aggregate(results: readonly CategoryResult[], options: AggregateOptions): FootprintResult {
    const byCategory = indexByCategory(results);

    let total = 0;
    const breakdown: Partial<Breakdown> = {};
    const details: Partial<Record<Category, DetailMap>> = {};

    for (const category of CATEGORY_ORDER) {
        const result = byCategory.get(category);
        if (!result) {
            throw new InvalidInputError(category, "missing category result");
        }
        breakdown[category] = result.subtotalKgCo2;
        details[category] = result.details;
        total += result.subtotalKgCo2;
    }

    return Object.freeze({
        breakdown: Object.freeze(completeBreakdown(breakdown)),
        totalKgCo2: total,
        details: Object.freeze(completeDetails(details)),
        period: options.period,
        timestamp: options.timestamp,
    });
}

function completeBreakdown(partial: Partial<Breakdown>): Breakdown {
    const { transport = 0, food = 0, energy = 0, waste = 0, consumption = 0 } = partial;
    return { transport, food, energy, waste, consumption };
}

function completeDetails(partial: Partial<Record<Category, DetailMap>>): Record<Category, DetailMap> {
    const { transport = {}, food = {}, energy = {}, waste = {}, consumption = {} } = partial;
    return { transport, food, energy, waste, consumption };
}
