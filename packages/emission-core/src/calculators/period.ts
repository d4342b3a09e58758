/**
 * as-reported: formulas applied to each field's own cadence (commute scaled
 * to a week, food and waste weekly, energy and consumption monthly).
 * weekly: monthly categories are brought down to a week as well.
 */
export type ReportingPeriod = "as-reported" | "weekly";

export const REPORTING_PERIODS: readonly ReportingPeriod[] = ["as-reported", "weekly"];

export const DAYS_PER_WEEK = 7;
export const WEEKS_PER_MONTH = 52 / 12;

export function isReportingPeriod(value: string): value is ReportingPeriod {
    return REPORTING_PERIODS.some((period) => period === value);
}

/** multiplier applied to a monthly quantity */
export function monthlyScale(period: ReportingPeriod): number {
    return period === "weekly" ? 1 / WEEKS_PER_MONTH : 1;
}
