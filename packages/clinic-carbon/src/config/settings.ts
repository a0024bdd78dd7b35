import type { Region } from "@clinic-carbon/emission-core";
import type { LogLevel } from "@clinic-carbon/shared";
import { DEFAULT_FACTORS_PATH, loadConfig, type AppConfig } from "./config.js";

export interface Settings {
    factorsPath: string;
    region: Region;
    includeAnaesthetics: boolean;
    host: string;
    port: number;
    logLevel: LogLevel;
    cacheEntries: number;
}

export const DEFAULT_SETTINGS: Settings = {
    factorsPath: DEFAULT_FACTORS_PATH,
    region: "NSW",
    includeAnaesthetics: false,
    host: "127.0.0.1",
    port: 3000,
    logLevel: "info",
    cacheEntries: 8,
};

export interface SettingsOverrides {
    factorsPath?: string;
    region?: Region;
    includeAnaesthetics?: boolean;
    host?: string;
    port?: number;
    logLevel?: LogLevel;
}

/**
 * flag > config file > built-in default
 */
export function mergeSettings(config: AppConfig, overrides: SettingsOverrides = {}): Settings {
    return {
        factorsPath: overrides.factorsPath ?? config.factorsPath ?? DEFAULT_SETTINGS.factorsPath,
        region: overrides.region ?? config.defaults?.region ?? DEFAULT_SETTINGS.region,
        includeAnaesthetics: overrides.includeAnaesthetics
            ?? config.defaults?.includeAnaesthetics
            ?? DEFAULT_SETTINGS.includeAnaesthetics,
        host: overrides.host ?? config.server?.host ?? DEFAULT_SETTINGS.host,
        port: overrides.port ?? config.server?.port ?? DEFAULT_SETTINGS.port,
        logLevel: overrides.logLevel ?? config.log?.level ?? DEFAULT_SETTINGS.logLevel,
        cacheEntries: config.cache?.maxEntries ?? DEFAULT_SETTINGS.cacheEntries,
    };
}

export async function resolveSettings(configPath: string | undefined, overrides: SettingsOverrides = {}): Promise<Settings> {
    const config = configPath ? await loadConfig(configPath) : {};
    return mergeSettings(config, overrides);
}
