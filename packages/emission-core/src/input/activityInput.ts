import { FOOD_TYPES, type FoodType, type TransportMode, TRANSPORT_MODES, isTransportMode } from "../calculators/categories.js";
import { InvalidInputError } from "../errors/errors.js";

/**
 * Raw activity payload as it arrives over JSON.
 *
 * Cadences: commute is per day, food and waste per week, energy and
 * consumption per month. Contextual fields feed refinement only.
 */
export interface ActivityInput {
    // transport (mandatory)
    commute_km?: number;
    transport_mode?: string;

    // food, kg per week
    beef_kg?: number;
    chicken_kg?: number;
    pork_kg?: number;
    fish_kg?: number;
    dairy_kg?: number;
    vegetables_kg?: number;
    fruits_kg?: number;

    // energy, kWh per month (electricity mandatory)
    electricity_kwh?: number;
    natural_gas_kwh?: number;

    // waste, kg per week (waste mandatory)
    waste_kg?: number;
    recycled_kg?: number;

    // consumption, per month
    clothing_kg?: number;
    electronics_items?: number;

    // context; absent means unknown, never zero
    house_size?: number | null;
    occupants?: number | null;
    ac_hours?: number | null;
}

export interface TransportActivity {
    commuteKmPerDay: number;
    mode: TransportMode;
}

export type FoodActivity = Record<FoodType, number>;

export interface EnergyActivity {
    electricityKwh: number;
    naturalGasKwh: number;
}

export interface WasteActivity {
    wasteKg: number;
    recycledKg: number;
}

export interface ConsumptionActivity {
    clothingKg: number;
    electronicsItems: number;
}

export interface HouseholdContext {
    houseSizeM2?: number;
    occupants?: number;
    acHoursPerDay?: number;
}

export interface ValidatedActivity {
    transport: TransportActivity;
    food: FoodActivity;
    energy: EnergyActivity;
    waste: WasteActivity;
    consumption: ConsumptionActivity;
    context: HouseholdContext;
}

const FOOD_FIELDS = {
    beef: "beef_kg",
    chicken: "chicken_kg",
    pork: "pork_kg",
    fish: "fish_kg",
    dairy: "dairy_kg",
    vegetables: "vegetables_kg",
    fruits: "fruits_kg",
} as const satisfies Record<FoodType, keyof ActivityInput>;

const CONTEXT_FIELDS = ["house_size", "occupants", "ac_hours"] as const;

const KNOWN_FIELDS: ReadonlySet<string> = new Set<string>([
    "commute_km",
    "transport_mode",
    ...Object.values(FOOD_FIELDS),
    "electricity_kwh",
    "natural_gas_kwh",
    "waste_kg",
    "recycled_kg",
    "clothing_kg",
    "electronics_items",
    ...CONTEXT_FIELDS,
]);

type Payload = Record<string, unknown>;

function isPayload(value: unknown): value is Payload {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAbsent(value: unknown): value is undefined | null {
    return value === undefined || value === null;
}

function nonNegative(payload: Payload, field: string, options: { required?: boolean; integer?: boolean } = {}): number {
    const value = payload[field];
    if (isAbsent(value)) {
        if (options.required) {
            throw new InvalidInputError(field, "is required");
        }
        return 0;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new InvalidInputError(field, "must be a finite number");
    }
    if (value < 0) {
        throw new InvalidInputError(field, "must be >= 0");
    }
    if (options.integer && !Number.isInteger(value)) {
        throw new InvalidInputError(field, "must be an integer");
    }
    return value;
}

function optionalContext(payload: Payload, field: string, check: (n: number) => string | null): number | undefined {
    const value = payload[field];
    if (isAbsent(value)) return undefined;
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new InvalidInputError(field, "must be a finite number");
    }
    const problem = check(value);
    if (problem) {
        throw new InvalidInputError(field, problem);
    }
    return value;
}

function rejectUnknownFields(payload: Payload) {
    for (const key of Object.keys(payload)) {
        if (KNOWN_FIELDS.has(key)) continue;
        if (key.endsWith("_kg")) {
            throw new InvalidInputError(key, `unrecognized food subtype (expected one of ${FOOD_TYPES.join(", ")})`);
        }
        throw new InvalidInputError(key, "unrecognized field");
    }
}

function readTransportMode(payload: Payload): TransportMode {
    const mode = payload.transport_mode;
    if (isAbsent(mode)) {
        throw new InvalidInputError("transport_mode", "is required");
    }
    if (typeof mode !== "string" || !isTransportMode(mode)) {
        throw new InvalidInputError(
            "transport_mode",
            `unrecognized transport mode "${String(mode)}" (expected one of ${TRANSPORT_MODES.join(", ")})`
        );
    }
    return mode;
}

/**
 * Contextual fields only. Anything else in the payload is ignored here, so
 * refinement can be fed the same payload as the baseline or just the context.
 */
export function parseHouseholdContext(raw: unknown): HouseholdContext {
    if (!isPayload(raw)) {
        throw new InvalidInputError("input", "must be a JSON object");
    }
    const context: HouseholdContext = {};

    const houseSizeM2 = optionalContext(raw, "house_size", (n) => (n < 0 ? "must be >= 0" : null));
    const occupants = optionalContext(raw, "occupants", (n) =>
        !Number.isInteger(n) || n < 1 ? "must be an integer >= 1" : null
    );
    const acHoursPerDay = optionalContext(raw, "ac_hours", (n) =>
        n < 0 || n > 24 ? "must be between 0 and 24" : null
    );

    if (houseSizeM2 !== undefined) context.houseSizeM2 = houseSizeM2;
    if (occupants !== undefined) context.occupants = occupants;
    if (acHoursPerDay !== undefined) context.acHoursPerDay = acHoursPerDay;
    return context;
}

/**
 * Validate everything up front. Throws InvalidInputError naming the first
 * offending field; nothing is computed from a payload that fails here.
 */
export function validateActivityInput(raw: unknown): ValidatedActivity {
    if (!isPayload(raw)) {
        throw new InvalidInputError("input", "must be a JSON object");
    }
    rejectUnknownFields(raw);

    const transport: TransportActivity = {
        commuteKmPerDay: nonNegative(raw, "commute_km", { required: true }),
        mode: readTransportMode(raw),
    };

    const food: FoodActivity = {
        beef: nonNegative(raw, FOOD_FIELDS.beef),
        chicken: nonNegative(raw, FOOD_FIELDS.chicken),
        pork: nonNegative(raw, FOOD_FIELDS.pork),
        fish: nonNegative(raw, FOOD_FIELDS.fish),
        dairy: nonNegative(raw, FOOD_FIELDS.dairy),
        vegetables: nonNegative(raw, FOOD_FIELDS.vegetables),
        fruits: nonNegative(raw, FOOD_FIELDS.fruits),
    };

    const energy: EnergyActivity = {
        electricityKwh: nonNegative(raw, "electricity_kwh", { required: true }),
        naturalGasKwh: nonNegative(raw, "natural_gas_kwh"),
    };

    const waste: WasteActivity = {
        wasteKg: nonNegative(raw, "waste_kg", { required: true }),
        recycledKg: nonNegative(raw, "recycled_kg"),
    };

    const consumption: ConsumptionActivity = {
        clothingKg: nonNegative(raw, "clothing_kg"),
        electronicsItems: nonNegative(raw, "electronics_items", { integer: true }),
    };

    return {
        transport,
        food,
        energy,
        waste,
        consumption,
        context: parseHouseholdContext(raw),
    };
}
