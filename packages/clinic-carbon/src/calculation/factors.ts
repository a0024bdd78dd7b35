import type { FactorTable, FactorTableCache } from "@clinic-carbon/emission-core";
import { readBytes, type Logger } from "@clinic-carbon/shared";

export async function loadFactorsFile(file: string, cache: FactorTableCache, logger: Logger): Promise<FactorTable> {
    const bytes = await readBytes(file, "--factors");
    const { table, digest, hit } = cache.load(bytes);
    logger.debug({ file, digest, hit, rows: table.size }, "factor table loaded");
    return table;
}
