import type { FactorTable } from "../factors/FactorTable.js";
import { isEmissionDataError } from "../errors/errors.js";
import { ACTIVITIES, REGIONS, type ActivityKey, type Region } from "./catalog.js";

export type CoverageStatus = "ok" | "not_found" | "invalid_factor";

export interface CoverageEntry {
    key: ActivityKey;
    category: string;
    subcategory: string | undefined;
    state: string | undefined;
    status: CoverageStatus;
    factor: number | null;
    rawValue: string | null;
}

export interface CoverageOptions {
    regions?: readonly Region[];
    includeAnaesthetics?: boolean;
}

/**
 * Resolve every key a calculation could request and report each outcome,
 * instead of stopping at the first failure like `computeEmissions` does.
 * Electricity is checked once per region.
 */
export function checkFactorCoverage(table: FactorTable, options: CoverageOptions = {}): CoverageEntry[] {
    const { regions = REGIONS, includeAnaesthetics = false } = options;
    const entries: CoverageEntry[] = [];

    for (const activity of ACTIVITIES) {
        if (activity.group === "anaesthetics" && !includeAnaesthetics) continue;
        const states: ReadonlyArray<string | undefined> = activity.regional ? regions : [undefined];

        for (const state of states) {
            const base = { key: activity.key, category: activity.category, subcategory: activity.subcategory, state };
            try {
                const { row, factor } = table.resolve(base);
                entries.push({ ...base, status: "ok", factor, rawValue: row.factor });
            } catch (error) {
                if (!isEmissionDataError(error)) throw error;
                let status: CoverageStatus;
                if (error.kind === "not_found") status = "not_found";
                else if (error.kind === "invalid_factor") status = "invalid_factor";
                else throw error;
                const row = table.find(base);
                entries.push({ ...base, status, factor: null, rawValue: row ? row.factor : null });
            }
        }
    }
    return entries;
}
