import type { FootprintResult } from "../baseline/aggregate.js";
import { type Breakdown, CATEGORY_ORDER, type Category, type DetailEntry, type DetailMap } from "../calculators/categories.js";
import type { ReportingPeriod } from "../calculators/period.js";
import type { OffsetProject } from "../offsets/recommendOffsets.js";
import type { RefinedResult } from "../refine/refine.js";
import type { Suggestion } from "../suggestions/rankSuggestions.js";

export type JsonDetailValue = number | string;

export interface FootprintResponse {
    breakdown: Breakdown;
    baseline_total: number;
    details: Record<Category, Record<string, JsonDetailValue>>;
    period: ReportingPeriod;
    timestamp: string;
}

export interface RefinedResponse extends FootprintResponse {
    refined_breakdown: Breakdown;
    refined_total: number;
    adjustments: Breakdown;
    insights: string[];
}

export interface OffsetRecommendationJson {
    project_name: string;
    project_type: string;
    cost_per_ton: number;
    total_cost: number;
    impact_description: string;
    transaction_id: string;
    certificate_ref: string;
}

export interface OffsetResponse {
    recommendations: OffsetRecommendationJson[];
    total_footprint: number;
    message: string;
}

export interface SuggestionJson {
    rank: number;
    category: Category;
    subtotal_kg: number;
    share: number;
    message: string;
}

function detailValue(entry: DetailEntry): JsonDetailValue {
    switch (entry.kind) {
        case "contribution":
            return entry.kgCo2;
        case "note":
            return entry.text;
    }
}

function renderDetails(details: DetailMap): Record<string, JsonDetailValue> {
    const out: Record<string, JsonDetailValue> = {};
    for (const [key, entry] of Object.entries(details)) {
        out[key] = detailValue(entry);
    }
    return out;
}

function copyBreakdown(breakdown: Readonly<Breakdown>): Breakdown {
    return { ...breakdown };
}

export function buildFootprintResponse(result: FootprintResult): FootprintResponse {
    const details: Record<Category, Record<string, JsonDetailValue>> = {
        transport: {}, food: {}, energy: {}, waste: {}, consumption: {},
    };
    for (const category of CATEGORY_ORDER) {
        details[category] = renderDetails(result.details[category]);
    }
    return {
        breakdown: copyBreakdown(result.breakdown),
        baseline_total: result.totalKgCo2,
        details,
        period: result.period,
        timestamp: result.timestamp,
    };
}

export function buildRefinedResponse(result: RefinedResult): RefinedResponse {
    return {
        ...buildFootprintResponse(result),
        refined_breakdown: copyBreakdown(result.refinedBreakdown),
        refined_total: result.refinedTotalKgCo2,
        adjustments: copyBreakdown(result.adjustments),
        insights: [...result.insights],
    };
}

export function buildOffsetResponse(footprintKg: number, projects: readonly OffsetProject[]): OffsetResponse {
    return {
        recommendations: projects.map((p) => ({
            project_name: p.name,
            project_type: p.type,
            cost_per_ton: p.costPerTon,
            total_cost: p.totalCost,
            impact_description: p.description,
            transaction_id: p.transactionId,
            certificate_ref: p.certificateRef,
        })),
        total_footprint: footprintKg,
        message: `Found ${projects.length} offset options for ${footprintKg.toFixed(1)} kg CO2`,
    };
}

export function buildSuggestionsResponse(suggestions: readonly Suggestion[]): SuggestionJson[] {
    return suggestions.map((s) => ({
        rank: s.rank,
        category: s.category,
        subtotal_kg: s.subtotalKgCo2,
        share: s.share,
        message: s.message,
    }));
}
