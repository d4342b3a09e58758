import { join } from 'node:path';
import { mkdir, writeFile } from 'node:fs/promises';
import { FactorTable, type FactorTableSource, createCalculationContext, type ReportingPeriod } from '@carbontally/emission-core';

export const TEST_FACTORS: FactorTableSource = {
    transport: {
        car_petrol: { unit: 'km', factor: 0.19, source: 'test' },
        car_diesel: { unit: 'km', factor: 0.17, source: 'test' },
        car_hybrid: { unit: 'km', factor: 0.11, source: 'test' },
        car_ev: { unit: 'km', factor: 0.05, source: 'test' },
        bus_diesel: { unit: 'km', factor: 0.1, source: 'test' },
        train_electric: { unit: 'km', factor: 0.04, source: 'test' },
        bicycle: { unit: 'km', factor: 0, source: 'test' },
        walking: { unit: 'km', factor: 0, source: 'test' },
    },
    food: {
        beef: { unit: 'kg', factor: 60, source: 'test' },
        chicken: { unit: 'kg', factor: 6.9, source: 'test' },
        pork: { unit: 'kg', factor: 7.2, source: 'test' },
        fish: { unit: 'kg', factor: 5.1, source: 'test' },
        dairy: { unit: 'kg', factor: 3.2, source: 'test' },
        vegetables: { unit: 'kg', factor: 2, source: 'test' },
        fruits: { unit: 'kg', factor: 1.1, source: 'test' },
    },
    energy: {
        electricity: { unit: 'kWh', factor: 0.45, source: 'test' },
        natural_gas: { unit: 'kWh', factor: 0.18, source: 'test' },
    },
    waste: {
        landfill: { unit: 'kg', factor: 0.5, source: 'test' },
        recycling_credit: { unit: 'kg', factor: 0.2, source: 'test' },
    },
    consumption: {
        clothing: { unit: 'kg', factor: 15, source: 'test' },
        electronics_item: { unit: 'item', factor: 70, source: 'test' },
    },
};

export const FIXED_TIMESTAMP = '2026-01-05T08:00:00.000Z';

/** same instant on every call */
export function fixedClock(iso = FIXED_TIMESTAMP) {
    const ms = new Date(iso).getTime();
    return () => new Date(ms);
}

export function testFactorTable(source: FactorTableSource = TEST_FACTORS) {
    return FactorTable.fromSource(source);
}

export function testContext(period: ReportingPeriod = 'as-reported', source: FactorTableSource = TEST_FACTORS) {
    return createCalculationContext(testFactorTable(source), { period, clock: fixedClock() });
}

/** the reference commuter used across suites */
export const SAMPLE_INPUT = {
    commute_km: 20,
    transport_mode: 'car_petrol',
    beef_kg: 0.5,
    electricity_kwh: 300,
    waste_kg: 5,
    recycled_kg: 3,
};

export async function writeJsonFile(baseDir: string, name: string, data: unknown) {
    await mkdir(baseDir, { recursive: true });
    const file = join(baseDir, name);
    await writeFile(file, JSON.stringify(data, null, 2), 'utf8');
    return file;
}
