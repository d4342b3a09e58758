import type { FactorTable } from "../factors/FactorTable.js";
import type { FoodActivity } from "../input/activityInput.js";
import { type CategoryResult, type DetailEntry, FOOD_TYPES, categoryResult, contribution } from "./categories.js";

export function calculateFood(activity: FoodActivity, factors: FactorTable): CategoryResult {
    let subtotal = 0;
    const details: Record<string, DetailEntry> = {};

    for (const type of FOOD_TYPES) {
        const massKg = activity[type];
        if (massKg <= 0) continue;

        const emissions = massKg * factors.lookup("food", type).kgCo2PerUnit;
        subtotal += emissions;
        details[type] = contribution(emissions);
    }

    return categoryResult("food", subtotal, details);
}
