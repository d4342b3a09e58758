import test from "node:test";
import assert from "node:assert/strict";
import { calculateBaseline } from "./calculateBaseline.js";
import { aggregate } from "./aggregate.js";
import { categoryResult, contribution } from "../calculators/categories.js";
import { FactorNotFoundError, InvalidInputError } from "../errors/errors.js";
import { createCalculationContext } from "../context.js";
import { FIXED_TIMESTAMP, SAMPLE_INPUT, TEST_FACTORS, fixedClock, testContext, testFactorTable } from "../../../../utils/test-utils.js";

const EPSILON = 1e-9;

function assertClose(actual: number, expected: number) {
    assert.ok(Math.abs(actual - expected) <= EPSILON, `expected ${actual} to be within ${EPSILON} of ${expected}`);
}

test("calculateBaseline: reference commuter", () => {
    const result = calculateBaseline(SAMPLE_INPUT, testContext());

    assertClose(result.breakdown.transport, 26.6);
    assertClose(result.breakdown.food, 30);
    assertClose(result.breakdown.energy, 135);
    assertClose(result.breakdown.waste, 0.4);
    assert.equal(result.breakdown.consumption, 0);
    assertClose(result.totalKgCo2, 192);

    const { transport, food, energy, waste, consumption } = result.breakdown;
    assert.equal(result.totalKgCo2, transport + food + energy + waste + consumption);
    assert.equal(result.period, "as-reported");
    assert.equal(result.timestamp, FIXED_TIMESTAMP);
});

test("calculateBaseline: minimum valid input keeps every category at zero", () => {
    const result = calculateBaseline(
        { commute_km: 0, transport_mode: "car_petrol", electricity_kwh: 0, waste_kg: 0 },
        testContext()
    );
    assert.deepStrictEqual(result.breakdown, { transport: 0, food: 0, energy: 0, waste: 0, consumption: 0 });
    assert.deepStrictEqual(Object.keys(result.details), ["transport", "food", "energy", "waste", "consumption"]);
    assert.equal(result.totalKgCo2, 0);
});

test("calculateBaseline: identical input gives byte-identical output", () => {
    const context = testContext();
    const first = JSON.stringify(calculateBaseline({ ...SAMPLE_INPUT, chicken_kg: 1.3, clothing_kg: 0.7 }, context));
    const second = JSON.stringify(calculateBaseline({ ...SAMPLE_INPUT, chicken_kg: 1.3, clothing_kg: 0.7 }, context));
    assert.equal(first, second);
});

test("calculateBaseline: timestamp comes from the context clock", () => {
    const context = createCalculationContext(testFactorTable(), { clock: fixedClock("2030-06-01T00:00:00.000Z") });
    assert.equal(calculateBaseline(SAMPLE_INPUT, context).timestamp, "2030-06-01T00:00:00.000Z");
});

test("calculateBaseline: weekly period is recorded and rescales monthly categories", () => {
    const result = calculateBaseline({ ...SAMPLE_INPUT, clothing_kg: 1 }, testContext("weekly"));
    assert.equal(result.period, "weekly");
    assertClose(result.breakdown.energy, (135 * 12) / 52);
    assertClose(result.breakdown.consumption, (15 * 12) / 52);
    // already weekly
    assertClose(result.breakdown.transport, 26.6);
    assertClose(result.breakdown.food, 30);
});

test("calculateBaseline: failures are whole", async (t) => {
    await t.test("teleporter is InvalidInput, not a computed zero", () => {
        assert.throws(
            () => calculateBaseline({ ...SAMPLE_INPUT, transport_mode: "teleporter" }, testContext()),
            (error: unknown) => error instanceof InvalidInputError && error.field === "transport_mode"
        );
    });

    await t.test("missing mandatory field", () => {
        const { electricity_kwh: _kwh, ...rest } = SAMPLE_INPUT;
        assert.throws(
            () => calculateBaseline(rest, testContext()),
            (error: unknown) => error instanceof InvalidInputError && error.field === "electricity_kwh"
        );
    });

    await t.test("factor gap surfaces as FactorNotFound, distinct from InvalidInput", () => {
        const { beef: _beef, ...food } = TEST_FACTORS.food ?? {};
        const context = testContext("as-reported", { ...TEST_FACTORS, food });
        assert.throws(
            () => calculateBaseline(SAMPLE_INPUT, context),
            (error: unknown) =>
                error instanceof FactorNotFoundError &&
                !(error instanceof InvalidInputError) &&
                error.category === "food" &&
                error.subtype === "beef"
        );
    });
});

test("calculateBaseline: result is frozen", () => {
    const result = calculateBaseline(SAMPLE_INPUT, testContext());
    assert.equal(Object.isFrozen(result), true);
    assert.equal(Object.isFrozen(result.breakdown), true);
    assert.equal(Object.isFrozen(result.details), true);
});

test("aggregate", async (t) => {
    const results = [
        categoryResult("transport", 0.1, { commute: contribution(0.1) }),
        categoryResult("food", 0.2, {}),
        categoryResult("energy", 0.3, {}),
        categoryResult("waste", 1e-17, {}),
        categoryResult("consumption", 1e16, {}),
    ];
    const options = { period: "as-reported" as const, timestamp: FIXED_TIMESTAMP };

    await t.test("input order does not change the total", () => {
        const forward = aggregate(results, options);
        const backward = aggregate([...results].reverse(), options);
        assert.equal(forward.totalKgCo2, backward.totalKgCo2);
        assert.deepStrictEqual(Object.keys(backward.breakdown), ["transport", "food", "energy", "waste", "consumption"]);
    });

    await t.test("sums in declaration order", () => {
        assert.equal(aggregate(results, options).totalKgCo2, 0.1 + 0.2 + 0.3 + 1e-17 + 1e16);
    });

    await t.test("missing or duplicate categories are rejected", () => {
        assert.throws(() => aggregate(results.slice(1), options), /transport: missing category result/);
        assert.throws(() => aggregate([...results, results[0]], options), InvalidInputError);
    });
});
