export const REGIONS = ["NSW", "QLD", "VIC", "SA", "WA", "TAS", "ACT", "NT"] as const;
export type Region = typeof REGIONS[number];

export type ActivityGroup = "electricity" | "fuels" | "anaesthetics";
export type EmissionScope = 1 | 2;

export interface ActivityDefinition {
    key: string;
    label: string;
    unit: string;
    category: string;
    // undefined: the lookup does not filter on subcategory
    subcategory?: string;
    // looked up with the selected region as `state`
    regional: boolean;
    group: ActivityGroup;
    scope: EmissionScope;
}

/**
 * Fixed activity taxonomy. Category and subcategory strings must match the
 * factor table byte for byte. Order is the lookup order.
 */
export const ACTIVITIES = [
    { key: "electricity_kWh", label: "Grid electricity", unit: "kWh", category: "electricity", subcategory: undefined, regional: true, group: "electricity", scope: 2 },
    { key: "petrol_L", label: "Petrol", unit: "L", category: "fuel", subcategory: "petrol_L", regional: false, group: "fuels", scope: 1 },
    { key: "diesel_L", label: "Diesel", unit: "L", category: "fuel", subcategory: "diesel_L", regional: false, group: "fuels", scope: 1 },
    { key: "lpg_L", label: "LPG", unit: "L", category: "fuel", subcategory: "lpg_L", regional: false, group: "fuels", scope: 1 },
    { key: "natural_gas_MJ", label: "Natural gas", unit: "MJ", category: "fuel", subcategory: "natural_gas_MJ", regional: false, group: "fuels", scope: 1 },
    { key: "isoflurane_g", label: "Isoflurane", unit: "g", category: "anaes", subcategory: "isoflurane_g", regional: false, group: "anaesthetics", scope: 1 },
    { key: "sevoflurane_g", label: "Sevoflurane", unit: "g", category: "anaes", subcategory: "sevoflurane_g", regional: false, group: "anaesthetics", scope: 1 },
    { key: "desflurane_g", label: "Desflurane", unit: "g", category: "anaes", subcategory: "desflurane_g", regional: false, group: "anaesthetics", scope: 1 },
    { key: "n2o_g", label: "Nitrous oxide", unit: "g", category: "anaes", subcategory: "n2o_g", regional: false, group: "anaesthetics", scope: 1 },
] as const satisfies readonly ActivityDefinition[];

export type ActivityKey = typeof ACTIVITIES[number]["key"];

export const ACTIVITY_KEYS: readonly ActivityKey[] = ACTIVITIES.map((activity) => activity.key);

const REGION_NAMES: ReadonlySet<string> = new Set(REGIONS);
const ACTIVITY_NAMES: ReadonlySet<string> = new Set(ACTIVITY_KEYS);

export function isRegion(value: unknown): value is Region {
    return typeof value === "string" && REGION_NAMES.has(value);
}

export function isActivityKey(value: unknown): value is ActivityKey {
    return typeof value === "string" && ACTIVITY_NAMES.has(value);
}
