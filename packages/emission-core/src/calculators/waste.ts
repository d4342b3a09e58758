import type { FactorTable } from "../factors/FactorTable.js";
import type { WasteActivity } from "../input/activityInput.js";
import { type CategoryResult, type DetailEntry, categoryResult, contribution, note } from "./categories.js";

function negate(n: number) {
    return n === 0 ? 0 : -n;
}

/**
 * landfill = (waste - recycled) * landfill factor, for the part not recycled
 * credit   = recycled * credit factor, counting at most `waste` kg
 *
 * The credit never exceeds the landfill emissions, so the subtotal is >= 0:
 * recycling offsets what goes to landfill and nothing more.
 */
export function calculateWaste(activity: WasteActivity, factors: FactorTable): CategoryResult {
    const { wasteKg, recycledKg } = activity;
    const details: Record<string, DetailEntry> = {};

    const landfillMassKg = Math.max(wasteKg - recycledKg, 0);
    const landfill = landfillMassKg * factors.lookup("waste", "landfill").kgCo2PerUnit;
    details.landfill = contribution(landfill);

    let credit = 0;
    if (recycledKg > 0) {
        const creditedMassKg = Math.min(recycledKg, wasteKg);
        const uncapped = creditedMassKg * factors.lookup("waste", "recycling_credit").kgCo2PerUnit;
        credit = Math.min(uncapped, landfill);
        details.recycling_credit = contribution(negate(credit));

        if (credit < uncapped) {
            details.credit_cap = note("recycling credit capped at landfill emissions");
        }
    }

    return categoryResult("waste", landfill - credit, details);
}
