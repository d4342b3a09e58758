import type { ReportingPeriod } from "./calculators/period.js";
import type { FactorTable } from "./factors/FactorTable.js";

/**
 * Everything a calculation depends on besides its input. Passed explicitly so
 * tests can swap factor sets and pin the clock.
 */
export interface CalculationContext {
    readonly factors: FactorTable;
    readonly period: ReportingPeriod;
    readonly clock: () => Date;
}

export interface CalculationContextOptions {
    period?: ReportingPeriod;
    clock?: () => Date;
}

export function createCalculationContext(factors: FactorTable, options: CalculationContextOptions = {}): CalculationContext {
    return Object.freeze({
        factors,
        period: options.period ?? "as-reported",
        clock: options.clock ?? (() => new Date()),
    });
}
