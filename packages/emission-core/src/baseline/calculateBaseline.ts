import { calculateConsumption } from "../calculators/consumption.js";
import { calculateEnergy } from "../calculators/energy.js";
import { calculateFood } from "../calculators/food.js";
import { calculateTransport } from "../calculators/transport.js";
import { calculateWaste } from "../calculators/waste.js";
import type { CalculationContext } from "../context.js";
import { validateActivityInput } from "../input/activityInput.js";
import { type FootprintResult, aggregate } from "./aggregate.js";

/**
 * Validate, run the five calculators against one factor table, aggregate.
 * Either the whole footprint comes back or the call throws.
 */
export function calculateBaseline(input: unknown, context: CalculationContext): FootprintResult {
    const activity = validateActivityInput(input);
    // read once: the same table serves every calculator of this call
    const { factors, period } = context;

    const results = [
        calculateTransport(activity.transport, factors),
        calculateFood(activity.food, factors),
        calculateEnergy(activity.energy, factors, period),
        calculateWaste(activity.waste, factors),
        calculateConsumption(activity.consumption, factors, period),
    ];

    return aggregate(results, {
        period,
        timestamp: context.clock().toISOString(),
    });
}
