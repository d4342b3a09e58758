export { CATEGORY_ORDER, FOOD_TYPES, TRANSPORT_MODES, isCategory, isTransportMode } from "./calculators/categories.js";
export type { Breakdown, Category, CategoryResult, DetailEntry, DetailMap, FoodType, TransportMode } from "./calculators/categories.js";
export { REPORTING_PERIODS, isReportingPeriod, monthlyScale } from "./calculators/period.js";
export type { ReportingPeriod } from "./calculators/period.js";

export { calculateTransport } from "./calculators/transport.js";
export { calculateFood } from "./calculators/food.js";
export { calculateEnergy } from "./calculators/energy.js";
export { calculateWaste } from "./calculators/waste.js";
export { calculateConsumption } from "./calculators/consumption.js";

export { CarbonTallyError, FactorNotFoundError, InvalidInputError, isCarbonTallyError } from "./errors/errors.js";
export type { CarbonTallyErrorCode } from "./errors/errors.js";

export { FactorTable } from "./factors/FactorTable.js";
export type { EmissionFactor, FactorEntrySource, FactorTableSource } from "./factors/FactorTable.js";
export { FactorRegistry } from "./factors/FactorRegistry.js";

export { parseHouseholdContext, validateActivityInput } from "./input/activityInput.js";
export type { ActivityInput, HouseholdContext, ValidatedActivity } from "./input/activityInput.js";

export { createCalculationContext } from "./context.js";
export type { CalculationContext, CalculationContextOptions } from "./context.js";

export { aggregate } from "./baseline/aggregate.js";
export type { AggregateOptions, FootprintResult } from "./baseline/aggregate.js";
export { calculateBaseline } from "./baseline/calculateBaseline.js";

export { MAX_ADJUSTMENT, refine } from "./refine/refine.js";
export type { RefinedResult } from "./refine/refine.js";
export { DEFAULT_RULES, climateControlRule, dwellingDensityRule } from "./refine/rules.js";
export type { RefinementRule, RuleOutcome } from "./refine/rules.js";

export { OFFSET_CATALOG, recommendOffsets, syntheticTransactionId } from "./offsets/recommendOffsets.js";
export type { OffsetArchetype, OffsetProject, OffsetProjectType } from "./offsets/recommendOffsets.js";

export { MATERIALITY_THRESHOLD, rankSuggestions } from "./suggestions/rankSuggestions.js";
export type { Suggestion } from "./suggestions/rankSuggestions.js";

export * from "./export/buildJsonResponse.js";
