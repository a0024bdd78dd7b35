import {
    ACTIVITIES,
    computeEmissions,
    emissionShares,
    toMetricsTable,
    type ActivityInput,
    type Breakdown,
    type EmissionResult,
    type EmissionShare,
    type FacilityProfile,
    type FactorTable,
    type MetricsTable,
} from "@clinic-carbon/emission-core";
import type { Logger } from "@clinic-carbon/shared";

export interface CalculationReport {
    facility: FacilityProfile | null;
    result: EmissionResult;
    metrics: MetricsTable;
    shares: EmissionShare[];
}

export interface RunCalculationOptions {
    includeAnaesthetics: boolean;
    breakdown?: Breakdown;
    logger?: Logger;
}

/**
 * Anaesthetic quantities that will be ignored because the group is off.
 */
export function ignoredAnaestheticQuantities(input: ActivityInput): string[] {
    return ACTIVITIES
        .filter((activity) => activity.group === "anaesthetics")
        .filter((activity) => (input.quantities[activity.key] ?? 0) > 0)
        .map((activity) => activity.key);
}

export function runCalculation(table: FactorTable, input: ActivityInput, options: RunCalculationOptions): CalculationReport {
    const { includeAnaesthetics, breakdown, logger } = options;

    if (!includeAnaesthetics && logger) {
        const ignored = ignoredAnaestheticQuantities(input);
        if (ignored.length > 0) {
            logger.warn({ ignored }, "anaesthetic gases are excluded, quantities ignored");
        }
    }

    const result = computeEmissions(table, input, { includeAnaesthetics });
    logger?.debug({ region: result.region, total_kgCO2e: result.total_kgCO2e, lines: result.lines.length }, "emissions computed");

    return {
        facility: input.facility ?? null,
        result,
        metrics: toMetricsTable(result, { breakdown }),
        shares: emissionShares(result),
    };
}
