import type { EmissionLine, GroupTotals } from "./types.js";

export interface AccumulatorTotals {
    lines: readonly EmissionLine[];
    groups: GroupTotals;
    scope1_kgCO2e: number;
    scope2_kgCO2e: number;
    total_kgCO2e: number;
}

/**
 * Collects line contributions in lookup order and sums them per group.
 */
export class EmissionAccumulator {
    private readonly _lines: EmissionLine[] = [];
    private readonly _groups: GroupTotals = { electricity: 0, fuels: 0, anaesthetics: 0 };

    push(line: EmissionLine): void {
        this._lines.push(Object.freeze({ ...line }));
        this._groups[line.group] += line.kgCO2e;
    }

    /**
     * Scope 1 is fuels + anaesthetic gases, scope 2 is grid electricity.
     */
    finalize(): AccumulatorTotals {
        const groups = Object.freeze({ ...this._groups });
        const scope1_kgCO2e = groups.fuels + groups.anaesthetics;
        const scope2_kgCO2e = groups.electricity;

        return {
            lines: Object.freeze([...this._lines]),
            groups,
            scope1_kgCO2e,
            scope2_kgCO2e,
            total_kgCO2e: scope1_kgCO2e + scope2_kgCO2e,
        };
    }
}
