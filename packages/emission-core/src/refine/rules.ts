import type { Category } from "../calculators/categories.js";
import type { HouseholdContext } from "../input/activityInput.js";

export interface RuleOutcome {
    multiplier: number;
    rationale: string;
}

/**
 * A deterministic correction scoped to one category. `evaluate` returns null
 * when the context it needs is absent; the rule then does not fire.
 */
export interface RefinementRule {
    readonly id: string;
    readonly label: string;
    readonly category: Category;
    evaluate(context: HouseholdContext): RuleOutcome | null;
}

export const BASELINE_AREA_PER_PERSON_M2 = 40;
export const REFERENCE_CLIMATE_HOURS = 4;
export const CLIMATE_SHIFT_PER_HOUR = 0.02;

export function clamp(x: number, min: number, max: number) {
    if (x < min) return min;
    if (x > max) return max;
    return x;
}

export const dwellingDensityRule: RefinementRule = {
    id: "dwelling-density",
    label: "Dwelling density",
    category: "energy",
    evaluate({ houseSizeM2, occupants }) {
        if (houseSizeM2 === undefined || occupants === undefined) return null;
        const ratio = houseSizeM2 / (occupants * BASELINE_AREA_PER_PERSON_M2);
        return {
            multiplier: clamp(ratio, 0.7, 1.3),
            rationale: `${houseSizeM2} m² for ${occupants} occupant${occupants === 1 ? "" : "s"} is ${ratio.toFixed(2)}x the ${BASELINE_AREA_PER_PERSON_M2} m²/person reference`,
        };
    },
};

// shape taken from the household usage curve: roughly 2% more energy per daily hour of AC
export const climateControlRule: RefinementRule = {
    id: "climate-control",
    label: "Climate control",
    category: "energy",
    evaluate({ acHoursPerDay }) {
        if (acHoursPerDay === undefined) return null;
        const shift = (acHoursPerDay - REFERENCE_CLIMATE_HOURS) * CLIMATE_SHIFT_PER_HOUR;
        return {
            multiplier: clamp(1 + shift, 0.85, 1.15),
            rationale: `${acHoursPerDay} h/day of climate control against a ${REFERENCE_CLIMATE_HOURS} h/day reference`,
        };
    },
};

export const DEFAULT_RULES: readonly RefinementRule[] = [dwellingDensityRule, climateControlRule];
