import Papa from "papaparse";
import type { EmissionResult, Intensity } from "../calculator/types.js";

export type Breakdown = "groups" | "combined" | "lines";
export const BREAKDOWNS: readonly Breakdown[] = ["groups", "combined", "lines"];

export interface MetricRow {
    metric: string;
    kgCO2e: number;
}

export interface MetricsTable {
    rows: readonly MetricRow[];
    intensity: Intensity;
}

export interface MetricsTableOptions {
    breakdown?: Breakdown;
}

export const CSV_HEADER = ["Metric", "Value_kgCO2e"] as const;

export const METRIC_LABELS = {
    fuels: "Scope 1 (fuels)",
    anaesthetics: "Scope 1 (anaesthetic gases)",
    scope1: "Scope 1 (total)",
    scope2: "Scope 2 (electricity)",
    total: "Total (kgCO2e)",
} as const;

export function isBreakdown(value: unknown): value is Breakdown {
    return typeof value === "string" && BREAKDOWNS.some((breakdown) => breakdown === value);
}

function totalRows(result: EmissionResult): MetricRow[] {
    return [
        { metric: METRIC_LABELS.scope1, kgCO2e: result.scope1_kgCO2e },
        { metric: METRIC_LABELS.scope2, kgCO2e: result.scope2_kgCO2e },
        { metric: METRIC_LABELS.total, kgCO2e: result.total_kgCO2e },
    ];
}

function groupRows(result: EmissionResult): MetricRow[] {
    return [
        { metric: METRIC_LABELS.fuels, kgCO2e: result.groups.fuels },
        { metric: METRIC_LABELS.anaesthetics, kgCO2e: result.groups.anaesthetics },
        ...totalRows(result),
    ];
}

/**
 * Labelled metric → kgCO2e rows for display or export.
 * `combined` folds fuels and anaesthetic gases into the scope 1 total,
 * `lines` prefixes the group rows with one row per looked-up activity.
 */
export function toMetricsTable(result: EmissionResult, options: MetricsTableOptions = {}): MetricsTable {
    const { breakdown = "groups" } = options;

    let rows: MetricRow[];
    switch (breakdown) {
        case "combined":
            rows = totalRows(result);
            break;
        case "lines":
            rows = [
                ...result.lines.map((line) => ({ metric: `${line.label} (${line.unit})`, kgCO2e: line.kgCO2e })),
                ...groupRows(result),
            ];
            break;
        default:
            rows = groupRows(result);
            break;
    }

    return { rows: Object.freeze(rows), intensity: result.intensity };
}

/**
 * Two-column export: `Metric,Value_kgCO2e`.
 */
export function toCsv(table: MetricsTable): string {
    return Papa.unparse(
        {
            fields: [...CSV_HEADER],
            data: table.rows.map((row) => [row.metric, String(row.kgCO2e)]),
        },
        { newline: "\n" }
    );
}

export interface EmissionShare {
    category: "Grid electricity" | "Anaesthetic agents" | "Fuel";
    kgCO2e: number;
    // 0..1 of the total, 0 for every category when the total is 0
    share: number;
}

export function emissionShares(result: EmissionResult): EmissionShare[] {
    const total = result.total_kgCO2e;
    const parts: Array<Omit<EmissionShare, "share">> = [
        { category: "Grid electricity", kgCO2e: result.groups.electricity },
        { category: "Anaesthetic agents", kgCO2e: result.groups.anaesthetics },
        { category: "Fuel", kgCO2e: result.groups.fuels },
    ];
    return parts.map((part) => ({ ...part, share: total > 0 ? part.kgCO2e / total : 0 }));
}

export const INTENSITY_UNDEFINED_CAPTION = "Enter FTE > 0 to show intensity.";

export function formatIntensity(intensity: Intensity): string {
    if (!intensity.defined) return INTENSITY_UNDEFINED_CAPTION;
    return intensity.kgCO2ePerFte.toLocaleString("en-US", {
        minimumFractionDigits: 2,
        maximumFractionDigits: 2,
    });
}
