import { createHash } from "node:crypto";
import { decodeSource, loadFactorTable, type FactorTable, type FactorTableSource } from "./FactorTable.js";

export interface FactorTableCacheOptions {
    maxEntries?: number;
}

export interface CachedLoad {
    table: FactorTable;
    digest: string;
    hit: boolean;
}

export function digestSource(source: FactorTableSource): string {
    return createHash("sha256").update(source).digest("hex");
}

/**
 * Memoizes loaded tables by the SHA-256 of their bytes.
 * Least recently used entries are evicted past `maxEntries`.
 * A load that throws is not stored.
 */
export class FactorTableCache {
    private readonly maxEntries: number;
    private readonly entries = new Map<string, FactorTable>();

    constructor(options: FactorTableCacheOptions = {}) {
        const { maxEntries = 8 } = options;
        if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
            throw new RangeError("maxEntries must be a positive integer");
        }
        this.maxEntries = maxEntries;
    }

    get size(): number {
        return this.entries.size;
    }

    has(source: FactorTableSource): boolean {
        return this.entries.has(digestSource(source));
    }

    load(source: FactorTableSource): CachedLoad {
        const digest = digestSource(source);
        const cached = this.entries.get(digest);
        if (cached) {
            // refresh recency
            this.entries.delete(digest);
            this.entries.set(digest, cached);
            return { table: cached, digest, hit: true };
        }

        const table = loadFactorTable(decodeSource(source));
        this.entries.set(digest, table);
        while (this.entries.size > this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
        }
        return { table, digest, hit: false };
    }

    invalidate(source: FactorTableSource): boolean {
        return this.invalidateDigest(digestSource(source));
    }

    invalidateDigest(digest: string): boolean {
        return this.entries.delete(digest);
    }

    clear(): void {
        this.entries.clear();
    }
}
