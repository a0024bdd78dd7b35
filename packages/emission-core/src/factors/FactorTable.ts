import Papa, { type ParseError } from "papaparse";
import { InvalidFactorError, MalformedTableError, NotFoundError, SchemaError } from "../errors/errors.js";
import { REQUIRED_COLUMNS, type FactorKey, type FactorRow, type ResolvedFactor } from "./types.js";

export type FactorTableSource = Uint8Array | string;

// plain decimal / scientific notation only; rejects "", "NaN", "inf", "0x1F"
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseFactor(raw: string): number | null {
    const trimmed = raw.trim();
    if (!DECIMAL.test(trimmed)) return null;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : null;
}

export function decodeSource(source: FactorTableSource): string {
    const text = typeof source === "string"
        ? source
        : new TextDecoder("utf-8").decode(source);
    return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

// short rows are read as blanks, anything else means the text is broken
function isFatal(error: ParseError): boolean {
    return error.type !== "FieldMismatch" || error.code === "TooManyFields";
}

function cell(record: Record<string, unknown>, column: string): string {
    const value = record[column];
    return typeof value === "string" ? value : "";
}

/**
 * In-memory emission factor table.
 * Rows keep the order of the source; lookup is a linear scan and the first
 * match wins.
 */
export class FactorTable {
    readonly rows: readonly FactorRow[];
    readonly columns: readonly string[];

    constructor(rows: readonly FactorRow[], columns: readonly string[] = REQUIRED_COLUMNS) {
        this.rows = Object.freeze(rows.map((row) => Object.freeze({ ...row })));
        this.columns = Object.freeze([...columns]);
    }

    get size(): number {
        return this.rows.length;
    }

    find(key: FactorKey): FactorRow | undefined {
        const { category, subcategory, state } = key;
        return this.rows.find((row) =>
            row.category === category
            && (subcategory === undefined || row.subcategory === subcategory)
            && (state === undefined || row.state === state)
        );
    }

    resolve(key: FactorKey): ResolvedFactor {
        const row = this.find(key);
        if (!row) {
            throw new NotFoundError(key);
        }
        const factor = parseFactor(row.factor);
        if (factor === null) {
            throw new InvalidFactorError(row.factor, key);
        }
        return { row, factor };
    }

    lookup(category: string, subcategory?: string, state?: string): number {
        return this.resolve({ category, subcategory, state }).factor;
    }
}

/**
 * Parse a comma-delimited factor table (header row required).
 * Structure and column set are validated here, factor values are checked on lookup.
 */
export function loadFactorTable(source: FactorTableSource): FactorTable {
    const text = decodeSource(source);
    const parsed = Papa.parse<Record<string, unknown>>(text, {
        header: true,
        delimiter: ",",
        skipEmptyLines: "greedy",
    });

    const fatal = parsed.errors.find(isFatal);
    if (fatal) {
        throw new MalformedTableError(fatal.code, fatal.message, fatal.row === undefined ? null : fatal.row + 1);
    }

    const columns = parsed.meta.fields ?? [];
    const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
    if (missing.length > 0) {
        throw new SchemaError(missing);
    }

    const rows: FactorRow[] = parsed.data.map((record) => ({
        category: cell(record, "category"),
        subcategory: cell(record, "subcategory"),
        unit: cell(record, "unit"),
        factor: cell(record, "factor"),
        state: cell(record, "state"),
        source: cell(record, "source"),
        source_year: cell(record, "source_year"),
    }));

    return new FactorTable(rows, columns);
}
