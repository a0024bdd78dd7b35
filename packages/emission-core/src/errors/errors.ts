import type { FactorKey } from "../factors/types.js";

export type EmissionDataErrorKind = "schema" | "malformed" | "not_found" | "invalid_factor";

function describeKey(key: FactorKey): string {
    return `category='${key.category}', subcategory='${key.subcategory ?? "none"}', state='${key.state ?? "none"}'`;
}

/**
 * Data-quality failures raised by the factor table and the calculator.
 * None of them is transient: the table or the selections must be fixed.
 */
export abstract class EmissionDataError extends Error {
    abstract readonly kind: EmissionDataErrorKind;
}

export class SchemaError extends EmissionDataError {
    readonly kind = "schema";
    readonly missingColumns: readonly string[];

    constructor(missingColumns: readonly string[]) {
        super(`factor table is missing these columns: ${missingColumns.join(", ")}`);
        this.name = "SchemaError";
        this.missingColumns = Object.freeze([...missingColumns]);
    }
}

/**
 * The factor table text is not well-formed CSV (unterminated quote, too many fields).
 */
export class MalformedTableError extends EmissionDataError {
    readonly kind = "malformed";
    // parser error code, ex: MissingQuotes, TooManyFields
    readonly reason: string;
    // 1-based data row, null when the parser could not place it
    readonly row: number | null;

    constructor(reason: string, detail: string, row: number | null) {
        super(`factor table is malformed${row === null ? "" : ` at row ${row}`}: ${detail} (${reason})`);
        this.name = "MalformedTableError";
        this.reason = reason;
        this.row = row;
    }
}

export class NotFoundError extends EmissionDataError {
    readonly kind = "not_found";
    readonly category: string;
    readonly subcategory: string | undefined;
    readonly state: string | undefined;

    constructor(key: FactorKey) {
        super(`no emission factor found for ${describeKey(key)}`);
        this.name = "NotFoundError";
        this.category = key.category;
        this.subcategory = key.subcategory;
        this.state = key.state;
    }

    get key(): FactorKey {
        return { category: this.category, subcategory: this.subcategory, state: this.state };
    }
}

export class InvalidFactorError extends EmissionDataError {
    readonly kind = "invalid_factor";
    readonly rawValue: string;
    readonly category: string;
    readonly subcategory: string | undefined;
    readonly state: string | undefined;

    constructor(rawValue: string, key: FactorKey) {
        super(`factor for ${describeKey(key)} is not numeric: '${rawValue}'`);
        this.name = "InvalidFactorError";
        this.rawValue = rawValue;
        this.category = key.category;
        this.subcategory = key.subcategory;
        this.state = key.state;
    }

    get key(): FactorKey {
        return { category: this.category, subcategory: this.subcategory, state: this.state };
    }
}

export function isEmissionDataError(error: unknown): error is EmissionDataError {
    return error instanceof EmissionDataError;
}
