import type { FootprintResult } from "../baseline/aggregate.js";
import { type Breakdown, CATEGORY_ORDER } from "../calculators/categories.js";
import { parseHouseholdContext } from "../input/activityInput.js";
import { DEFAULT_RULES, type RefinementRule, clamp } from "./rules.js";

/** no category may move more than this fraction away from its baseline */
export const MAX_ADJUSTMENT = 0.3;

export interface RefinedResult extends FootprintResult {
    readonly refinedBreakdown: Readonly<Breakdown>;
    readonly refinedTotalKgCo2: number;
    /** refined minus baseline, per category */
    readonly adjustments: Readonly<Breakdown>;
    readonly insights: readonly string[];
}

function signedKg(kg: number) {
    return `${kg >= 0 ? "+" : ""}${kg.toFixed(2)}`;
}

/**
 * Apply the rules whose context is present. Multipliers compose per category
 * and the running product stays inside [1 - MAX_ADJUSTMENT, 1 + MAX_ADJUSTMENT].
 * Each fired rule adds one insight with its effective factor and kg delta.
 */
export function refine(
    baseline: FootprintResult,
    input: unknown,
    rules: readonly RefinementRule[] = DEFAULT_RULES
): RefinedResult {
    const context = parseHouseholdContext(input);

    const multipliers: Breakdown = { transport: 1, food: 1, energy: 1, waste: 1, consumption: 1 };
    const insights: string[] = [];

    for (const rule of rules) {
        const outcome = rule.evaluate(context);
        if (!outcome) continue;

        const before = multipliers[rule.category];
        const wanted = before * outcome.multiplier;
        const after = clamp(wanted, 1 - MAX_ADJUSTMENT, 1 + MAX_ADJUSTMENT);
        multipliers[rule.category] = after;

        const deltaKg = baseline.breakdown[rule.category] * (after - before);
        const capped = after !== wanted ? `, capped at ±${MAX_ADJUSTMENT * 100}%` : "";
        insights.push(
            `${rule.label}: ${outcome.rationale}; ${rule.category} x${(after / before).toFixed(3)} (${signedKg(deltaKg)} kg CO2${capped})`
        );
    }

    const refinedBreakdown: Breakdown = { transport: 0, food: 0, energy: 0, waste: 0, consumption: 0 };
    const adjustments: Breakdown = { transport: 0, food: 0, energy: 0, waste: 0, consumption: 0 };
    let refinedTotal = 0;

    for (const category of CATEGORY_ORDER) {
        const base = baseline.breakdown[category];
        const refined = base * multipliers[category];
        refinedBreakdown[category] = refined;
        adjustments[category] = refined - base;
        refinedTotal += refined;
    }

    return Object.freeze({
        ...baseline,
        refinedBreakdown: Object.freeze(refinedBreakdown),
        refinedTotalKgCo2: refinedTotal,
        adjustments: Object.freeze(adjustments),
        insights: Object.freeze(insights),
    });
}
