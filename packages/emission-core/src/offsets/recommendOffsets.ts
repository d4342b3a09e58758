import { createHash } from "node:crypto";
import { InvalidInputError } from "../errors/errors.js";

export type OffsetProjectType = "Reforestation" | "RenewableEnergy" | "EnergyEfficiency";

export interface OffsetArchetype {
    readonly name: string;
    readonly type: OffsetProjectType;
    readonly costPerTon: number; // USD per tonne CO2
    readonly describe: (footprintKg: number) => string;
}

export interface OffsetProject {
    readonly name: string;
    readonly type: OffsetProjectType;
    readonly costPerTon: number;
    readonly totalCost: number;
    readonly description: string;
    readonly transactionId: string;
    readonly certificateRef: string;
}

const KG_PER_TONNE = 1000;

export const OFFSET_CATALOG: readonly OffsetArchetype[] = [
    {
        name: "Amazon Rainforest Reforestation",
        type: "Reforestation",
        costPerTon: 15,
        describe: (kg) => `Plant trees to offset ${kg.toFixed(1)} kg of CO2 emissions`,
    },
    {
        name: "Solar Energy Project - India",
        type: "RenewableEnergy",
        costPerTon: 25,
        describe: (kg) => `Support solar energy development to offset ${kg.toFixed(1)} kg of CO2`,
    },
    {
        name: "Efficient Cookstoves Programme",
        type: "EnergyEfficiency",
        costPerTon: 20,
        describe: (kg) => `Replace open-fire cooking with efficient stoves to offset ${kg.toFixed(1)} kg of CO2`,
    },
];

/**
 * Synthetic, deterministic id: same project and footprint, same id.
 * No ledger is involved.
 */
export function syntheticTransactionId(projectName: string, footprintKg: number): string {
    const digest = createHash("sha256").update(`${projectName}|${footprintKg}`).digest("hex");
    return `0x${digest.slice(0, 16)}`;
}

export function recommendOffsets(totalKgCo2: number, catalog: readonly OffsetArchetype[] = OFFSET_CATALOG): OffsetProject[] {
    if (!Number.isFinite(totalKgCo2) || totalKgCo2 <= 0) {
        throw new InvalidInputError("footprint_kg", "must be greater than 0");
    }

    return catalog.map((archetype) => {
        const transactionId = syntheticTransactionId(archetype.name, totalKgCo2);
        return Object.freeze({
            name: archetype.name,
            type: archetype.type,
            costPerTon: archetype.costPerTon,
            totalCost: (totalKgCo2 / KG_PER_TONNE) * archetype.costPerTon,
            description: archetype.describe(totalKgCo2),
            transactionId,
            certificateRef: `CERT-${transactionId.slice(2).toUpperCase()}`,
        });
    });
}
