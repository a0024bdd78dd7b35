import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { extractErrorCode, LOG_LEVELS } from "@clinic-carbon/shared";
import { REGIONS } from "@clinic-carbon/emission-core";

export const DEFAULT_FACTORS_PATH = fileURLToPath(new URL("../../data/nga_factors_2024.csv", import.meta.url));

const configSchema = z.object({
    factorsPath: z.string().min(1).optional(),
    defaults: z.object({
        region: z.enum(REGIONS).optional(),
        includeAnaesthetics: z.boolean().optional(),
    }).strict().optional(),
    server: z.object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
    }).strict().optional(),
    log: z.object({
        level: z.enum(LOG_LEVELS).optional(),
    }).strict().optional(),
    cache: z.object({
        maxEntries: z.number().int().positive().optional(),
    }).strict().optional(),
}).strict();

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Load a JSON config file. A relative `factorsPath` is resolved against the
 * config file's directory.
 */
export async function loadConfig(configPath: string): Promise<AppConfig> {
    let raw: string;
    try {
        raw = await readFile(configPath, 'utf-8');
    } catch (error) {
        const code = extractErrorCode(error);
        if (code === 'ENOENT') throw new Error(`[--config]: no such file ${configPath}`);
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error("--config: invalid JSON");
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error("--config: invalid JSON object");
    }

    const result = configSchema.safeParse(parsed);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        throw new Error(`--config: ${where}: ${issue.message}`);
    }

    const config = result.data;
    if (config.factorsPath && !path.isAbsolute(config.factorsPath)) {
        config.factorsPath = path.resolve(path.dirname(configPath), config.factorsPath);
    }
    return config;
}
