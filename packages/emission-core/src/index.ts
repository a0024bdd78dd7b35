export { FactorTable, loadFactorTable, parseFactor, decodeSource } from "./factors/FactorTable.js";
export type { FactorTableSource } from "./factors/FactorTable.js";
export { FactorTableCache, digestSource } from "./factors/FactorTableCache.js";
export type { FactorTableCacheOptions, CachedLoad } from "./factors/FactorTableCache.js";
export { REQUIRED_COLUMNS } from "./factors/types.js";
export type { FactorColumn, FactorKey, FactorRow, ResolvedFactor } from "./factors/types.js";

export { ACTIVITIES, ACTIVITY_KEYS, REGIONS, isActivityKey, isRegion } from "./calculator/catalog.js";
export type { ActivityDefinition, ActivityGroup, ActivityKey, EmissionScope, Region } from "./calculator/catalog.js";
export { computeEmissions, computeIntensity, findLine } from "./calculator/calculator.js";
export type {
    ActivityInput,
    ActivityQuantities,
    CalculationOptions,
    EmissionLine,
    EmissionResult,
    FacilityProfile,
    GroupTotals,
    Intensity,
} from "./calculator/types.js";

export {
    BREAKDOWNS,
    CSV_HEADER,
    INTENSITY_UNDEFINED_CAPTION,
    METRIC_LABELS,
    emissionShares,
    formatIntensity,
    isBreakdown,
    toCsv,
    toMetricsTable,
} from "./report/report.js";
export type { Breakdown, EmissionShare, MetricRow, MetricsTable, MetricsTableOptions } from "./report/report.js";

export {
    EmissionDataError,
    InvalidFactorError,
    MalformedTableError,
    NotFoundError,
    SchemaError,
    isEmissionDataError,
} from "./errors/errors.js";
export type { EmissionDataErrorKind } from "./errors/errors.js";

export { checkFactorCoverage } from "./calculator/coverage.js";
export type { CoverageEntry, CoverageOptions, CoverageStatus } from "./calculator/coverage.js";
