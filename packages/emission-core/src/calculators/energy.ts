import type { FactorTable } from "../factors/FactorTable.js";
import type { EnergyActivity } from "../input/activityInput.js";
import { type CategoryResult, type DetailEntry, categoryResult, contribution } from "./categories.js";
import { type ReportingPeriod, monthlyScale } from "./period.js";

export function calculateEnergy(activity: EnergyActivity, factors: FactorTable, period: ReportingPeriod): CategoryResult {
    const scale = monthlyScale(period);
    const details: Record<string, DetailEntry> = {};

    // electricity is mandatory, so its factor is always required
    const electricity = activity.electricityKwh * factors.lookup("energy", "electricity").kgCo2PerUnit * scale;
    details.electricity = contribution(electricity);

    let gas = 0;
    if (activity.naturalGasKwh > 0) {
        gas = activity.naturalGasKwh * factors.lookup("energy", "natural_gas").kgCo2PerUnit * scale;
        details.natural_gas = contribution(gas);
    }

    return categoryResult("energy", electricity + gas, details);
}
