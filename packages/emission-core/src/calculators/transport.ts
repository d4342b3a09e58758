import type { FactorTable } from "../factors/FactorTable.js";
import type { TransportActivity } from "../input/activityInput.js";
import { type CategoryResult, categoryResult, contribution, note } from "./categories.js";
import { DAYS_PER_WEEK } from "./period.js";

// commute is reported per day; the category is always a weekly figure
export function calculateTransport(activity: TransportActivity, factors: FactorTable): CategoryResult {
    const { commuteKmPerDay, mode } = activity;
    const factor = factors.lookup("transport", mode);
    const commute = commuteKmPerDay * factor.kgCo2PerUnit * DAYS_PER_WEEK;

    return categoryResult("transport", commute, {
        commute: contribution(commute),
        mode: note(mode),
        distance_km: note(`${commuteKmPerDay} km/day`),
    });
}
