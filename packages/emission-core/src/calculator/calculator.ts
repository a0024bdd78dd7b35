import type { FactorTable } from "../factors/FactorTable.js";
import type { FactorKey } from "../factors/types.js";
import { ACTIVITIES, isRegion, type ActivityKey } from "./catalog.js";
import { EmissionAccumulator } from "./EmissionAccumulator.js";
import type { ActivityInput, CalculationOptions, EmissionLine, EmissionResult, Intensity } from "./types.js";

function isNonNegative(n: unknown): n is number {
    return typeof n === "number" && Number.isFinite(n) && n >= 0;
}

function assertInput(input: ActivityInput): void {
    if (!isRegion(input.region)) {
        throw new RangeError(`region must be one of NSW, QLD, VIC, SA, WA, TAS, ACT, NT (got '${String(input.region)}')`);
    }
    if (!isNonNegative(input.fte)) {
        throw new RangeError("fte must be a non-negative number");
    }
    for (const [key, quantity] of Object.entries(input.quantities)) {
        if (quantity !== undefined && !isNonNegative(quantity)) {
            throw new RangeError(`quantities.${key} must be a non-negative number`);
        }
    }
}

export function computeIntensity(total: number, fte: number): Intensity {
    if (fte > 0) {
        return { defined: true, kgCO2ePerFte: total / fte };
    }
    return { defined: false, kgCO2ePerFte: null };
}

/**
 * Look up every activity factor and sum quantity × factor into scope totals.
 *
 * Zero quantities are still looked up so an incomplete table fails even when
 * the activity is unused. Any lookup error aborts the whole calculation.
 * Anaesthetic gases are skipped (no lookup) unless `includeAnaesthetics` is set.
 */
export function computeEmissions(
    table: FactorTable,
    input: ActivityInput,
    options: CalculationOptions = {}
): EmissionResult {
    const { includeAnaesthetics = false } = options;
    assertInput(input);

    const accumulator = new EmissionAccumulator();

    for (const activity of ACTIVITIES) {
        if (activity.group === "anaesthetics" && !includeAnaesthetics) continue;

        const key: FactorKey = {
            category: activity.category,
            subcategory: activity.subcategory,
            state: activity.regional ? input.region : undefined,
        };
        const { row, factor } = table.resolve(key);
        const quantity = input.quantities[activity.key] ?? 0;

        accumulator.push({
            key: activity.key,
            label: activity.label,
            group: activity.group,
            scope: activity.scope,
            category: key.category,
            subcategory: key.subcategory,
            state: key.state,
            unit: activity.unit,
            quantity,
            factor,
            kgCO2e: quantity * factor,
            source: row.source,
            sourceYear: row.source_year,
        });
    }

    const totals = accumulator.finalize();

    return Object.freeze({
        region: input.region,
        fte: input.fte,
        includesAnaesthetics: includeAnaesthetics,
        ...totals,
        intensity: Object.freeze(computeIntensity(totals.total_kgCO2e, input.fte)),
    });
}

export function findLine(result: EmissionResult, key: ActivityKey): EmissionLine | undefined {
    return result.lines.find((line) => line.key === key);
}
