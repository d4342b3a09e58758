/**
 * Declaration order. Summation, breakdown keys and suggestion tie-breaks all
 * follow it.
 */
export const CATEGORY_ORDER = ["transport", "food", "energy", "waste", "consumption"] as const;

export type Category = typeof CATEGORY_ORDER[number];

export function isCategory(value: string): value is Category {
    return CATEGORY_ORDER.some((category) => category === value);
}

export const TRANSPORT_MODES = [
    "car_petrol",
    "car_diesel",
    "car_hybrid",
    "car_ev",
    "bus_diesel",
    "train_electric",
    "bicycle",
    "walking",
] as const;

export type TransportMode = typeof TRANSPORT_MODES[number];

export function isTransportMode(value: string): value is TransportMode {
    return TRANSPORT_MODES.some((mode) => mode === value);
}

export const FOOD_TYPES = ["beef", "chicken", "pork", "fish", "dairy", "vegetables", "fruits"] as const;

export type FoodType = typeof FOOD_TYPES[number];

export type Breakdown = Record<Category, number>;

export type DetailEntry =
    | { kind: "contribution"; kgCo2: number }
    | { kind: "note"; text: string };

export type DetailMap = Readonly<Record<string, DetailEntry>>;

export interface CategoryResult {
    readonly category: Category;
    readonly subtotalKgCo2: number;
    readonly details: DetailMap;
}

export function contribution(kgCo2: number): DetailEntry {
    return { kind: "contribution", kgCo2 };
}

export function note(text: string): DetailEntry {
    return { kind: "note", text };
}

export function categoryResult(category: Category, subtotalKgCo2: number, details: Record<string, DetailEntry>): CategoryResult {
    for (const entry of Object.values(details)) Object.freeze(entry);
    return Object.freeze({
        category,
        subtotalKgCo2,
        details: Object.freeze({ ...details }),
    });
}
