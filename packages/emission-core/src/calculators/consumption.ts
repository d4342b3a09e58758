import type { FactorTable } from "../factors/FactorTable.js";
import type { ConsumptionActivity } from "../input/activityInput.js";
import { type CategoryResult, type DetailEntry, categoryResult, contribution } from "./categories.js";
import { type ReportingPeriod, monthlyScale } from "./period.js";

export function calculateConsumption(activity: ConsumptionActivity, factors: FactorTable, period: ReportingPeriod): CategoryResult {
    const scale = monthlyScale(period);
    const details: Record<string, DetailEntry> = {};
    let subtotal = 0;

    if (activity.clothingKg > 0) {
        const clothing = activity.clothingKg * factors.lookup("consumption", "clothing").kgCo2PerUnit * scale;
        subtotal += clothing;
        details.clothing = contribution(clothing);
    }

    if (activity.electronicsItems > 0) {
        const electronics = activity.electronicsItems * factors.lookup("consumption", "electronics_item").kgCo2PerUnit * scale;
        subtotal += electronics;
        details.electronics = contribution(electronics);
    }

    return categoryResult("consumption", subtotal, details);
}
