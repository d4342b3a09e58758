import test from "node:test";
import assert from "node:assert/strict";
import { buildFootprintResponse, buildOffsetResponse, buildRefinedResponse, buildSuggestionsResponse } from "./buildJsonResponse.js";
import { calculateBaseline } from "../baseline/calculateBaseline.js";
import { refine } from "../refine/refine.js";
import { recommendOffsets } from "../offsets/recommendOffsets.js";
import { rankSuggestions } from "../suggestions/rankSuggestions.js";
import { FIXED_TIMESTAMP, SAMPLE_INPUT, testContext } from "../../../../utils/test-utils.js";

test("buildFootprintResponse: snake_case envelope with plain detail values", () => {
    const result = calculateBaseline(SAMPLE_INPUT, testContext());
    const response = buildFootprintResponse(result);

    assert.equal(response.baseline_total, result.totalKgCo2);
    assert.deepStrictEqual(response.breakdown, { ...result.breakdown });
    assert.equal(response.timestamp, FIXED_TIMESTAMP);
    assert.equal(response.period, "as-reported");
    assert.deepStrictEqual(response.details.transport, {
        commute: result.breakdown.transport,
        mode: "car_petrol",
        distance_km: "20 km/day",
    });
    assert.deepStrictEqual(response.details.food, { beef: 30 });
    assert.deepStrictEqual(response.details.consumption, {});
    // survives a JSON round trip unchanged
    assert.deepStrictEqual(JSON.parse(JSON.stringify(response)), response);
});

test("buildRefinedResponse: adds refined fields next to the baseline", () => {
    const baseline = calculateBaseline(SAMPLE_INPUT, testContext());
    const response = buildRefinedResponse(refine(baseline, { ac_hours: 4 }));

    assert.equal(response.baseline_total, baseline.totalKgCo2);
    assert.equal(response.refined_total, baseline.totalKgCo2);
    assert.deepStrictEqual(response.adjustments, { transport: 0, food: 0, energy: 0, waste: 0, consumption: 0 });
    assert.deepStrictEqual(response.insights, [
        "Climate control: 4 h/day of climate control against a 4 h/day reference; energy x1.000 (+0.00 kg CO2)",
    ]);
});

test("buildOffsetResponse", () => {
    const response = buildOffsetResponse(192, recommendOffsets(192));
    assert.equal(response.total_footprint, 192);
    assert.equal(response.message, "Found 3 offset options for 192.0 kg CO2");
    assert.deepStrictEqual(Object.keys(response.recommendations[0]), [
        "project_name",
        "project_type",
        "cost_per_ton",
        "total_cost",
        "impact_description",
        "transaction_id",
        "certificate_ref",
    ]);
    assert.equal(response.recommendations[1].project_type, "RenewableEnergy");
});

test("buildSuggestionsResponse", () => {
    const response = buildSuggestionsResponse(rankSuggestions({ transport: 60, food: 40 }));
    assert.deepStrictEqual(response.map((s) => [s.rank, s.category, s.subtotal_kg]), [
        [1, "transport", 60],
        [2, "food", 40],
    ]);
});
