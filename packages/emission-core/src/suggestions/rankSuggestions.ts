import { type Breakdown, CATEGORY_ORDER, type Category, isCategory } from "../calculators/categories.js";
import { InvalidInputError } from "../errors/errors.js";

export interface Suggestion {
    readonly rank: number;
    readonly category: Category;
    readonly subtotalKgCo2: number;
    readonly share: number;
    readonly message: string;
}

/** a category must exceed this share of the total to earn a suggestion */
export const MATERIALITY_THRESHOLD = 0.2;

const TIPS: Record<Category, { label: string; tip: string }> = {
    transport: { label: "Transport", tip: "Try car-pooling, public transport or cycling for part of your commute." },
    food: { label: "Food", tip: "Swapping some red meat for poultry, fish or plant proteins has the largest effect." },
    energy: { label: "Energy", tip: "Lower heating and cooling set points, or switch to a renewable electricity tariff." },
    waste: { label: "Waste", tip: "Recycle and compost more of what you currently send to landfill." },
    consumption: { label: "Consumption", tip: "Buy fewer new clothes and keep electronics in use for longer." },
};

function readBreakdown(raw: unknown): Breakdown {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
        throw new InvalidInputError("breakdown", "must be an object of category -> kg CO2");
    }
    const breakdown: Breakdown = { transport: 0, food: 0, energy: 0, waste: 0, consumption: 0 };
    for (const [key, value] of Object.entries(raw)) {
        if (!isCategory(key)) {
            throw new InvalidInputError(`breakdown.${key}`, "unknown category");
        }
        if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
            throw new InvalidInputError(`breakdown.${key}`, "must be a finite number >= 0");
        }
        breakdown[key] = value;
    }
    return breakdown;
}

/**
 * Rank categories by subtotal, largest first; equal subtotals keep
 * declaration order (sort is stable). Only material categories are returned.
 */
export function rankSuggestions(rawBreakdown: unknown): Suggestion[] {
    const breakdown = readBreakdown(rawBreakdown);

    let total = 0;
    for (const category of CATEGORY_ORDER) total += breakdown[category];
    if (total <= 0) return [];

    const ordered = [...CATEGORY_ORDER].sort((a, b) => breakdown[b] - breakdown[a]);

    return ordered
        .filter((category) => breakdown[category] / total > MATERIALITY_THRESHOLD)
        .map((category, index) => {
            const share = breakdown[category] / total;
            const { label, tip } = TIPS[category];
            return Object.freeze({
                rank: index + 1,
                category,
                subtotalKgCo2: breakdown[category],
                share,
                message: `${label} accounts for ${(share * 100).toFixed(1)}% of your footprint. ${tip}`,
            });
        });
}
