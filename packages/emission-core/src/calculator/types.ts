import type { ActivityGroup, ActivityKey, EmissionScope, Region } from "./catalog.js";

export type ActivityQuantities = Partial<Record<ActivityKey, number>>;

export interface FacilityProfile {
    name?: string;
    reportingYear?: string;
}

export interface ActivityInput {
    region: Region;
    // headcount used as the intensity denominator, may be 0
    fte: number;
    quantities: ActivityQuantities;
    facility?: FacilityProfile;
}

export interface CalculationOptions {
    /** Anaesthetic gases are opt-in. When off, their factors are never looked up. */
    includeAnaesthetics?: boolean;
}

export interface EmissionLine {
    key: ActivityKey;
    label: string;
    group: ActivityGroup;
    scope: EmissionScope;
    category: string;
    subcategory: string | undefined;
    state: string | undefined;
    unit: string;
    quantity: number;
    factor: number;
    kgCO2e: number;
    source: string;
    sourceYear: string;
}

export type Intensity =
    | { defined: true; kgCO2ePerFte: number }
    | { defined: false; kgCO2ePerFte: null };

export interface GroupTotals {
    electricity: number;
    fuels: number;
    anaesthetics: number;
}

export interface EmissionResult {
    region: Region;
    fte: number;
    includesAnaesthetics: boolean;
    lines: readonly EmissionLine[];
    groups: GroupTotals;
    scope1_kgCO2e: number;
    scope2_kgCO2e: number;
    total_kgCO2e: number;
    intensity: Intensity;
}
