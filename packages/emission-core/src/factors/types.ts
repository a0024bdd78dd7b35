export const REQUIRED_COLUMNS = [
    "category",
    "subcategory",
    "unit",
    "factor",
    "state",
    "source",
    "source_year",
] as const;

export type FactorColumn = typeof REQUIRED_COLUMNS[number];

/**
 * One record of the factor table, cells kept as read.
 * A blank cell is an empty string; `factor` is parsed on lookup only.
 */
export type FactorRow = Readonly<Record<FactorColumn, string>>;

/**
 * Lookup selector. An omitted `subcategory` or `state` disables that filter
 * (it does not match blank cells).
 */
export interface FactorKey {
    category: string;
    subcategory?: string;
    state?: string;
}

export interface ResolvedFactor {
    row: FactorRow;
    factor: number;
}
