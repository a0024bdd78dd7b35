import fastify from "fastify";
import { ZodError } from "zod";
import {
    ACTIVITIES,
    InvalidFactorError,
    MalformedTableError,
    NotFoundError,
    REGIONS,
    SchemaError,
    isEmissionDataError,
    toCsv,
    type EmissionDataError,
    type FactorKey,
    type FactorTable,
    type FactorTableCache,
    type Region,
} from "@clinic-carbon/emission-core";
import type { Logger } from "@clinic-carbon/shared";
import { parseCalculationRequest, toActivityInput } from "../calculation/request.js";
import { runCalculation, type CalculationReport } from "../calculation/runCalculation.js";

export interface ServerOptions {
    logger: Logger;
    // bundled or configured table, used when a request carries no upload
    factors: FactorTable;
    cache: FactorTableCache;
    defaults: {
        region: Region;
        includeAnaesthetics: boolean;
    };
}

export const CSV_FILENAME = "emissions_results.csv";

function keyBody(key: FactorKey) {
    return { category: key.category, subcategory: key.subcategory ?? null, state: key.state ?? null };
}

function dataErrorBody(error: EmissionDataError): Record<string, unknown> {
    if (error instanceof SchemaError) return { missingColumns: error.missingColumns };
    if (error instanceof MalformedTableError) return { reason: error.reason, row: error.row };
    if (error instanceof InvalidFactorError) return { rawValue: error.rawValue, ...keyBody(error.key) };
    if (error instanceof NotFoundError) return keyBody(error.key);
    return {};
}

export async function buildServer(options: ServerOptions) {
    const { logger, factors, cache, defaults } = options;
    const app = fastify({ loggerInstance: logger });

    app.setErrorHandler(async (error, request, reply) => {
        if (error instanceof ZodError) {
            return reply.status(400).send({
                error: "invalid_request",
                issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
            });
        }
        if (isEmissionDataError(error)) {
            request.log.warn({ kind: error.kind }, error.message);
            return reply.status(422).send({ error: error.kind, message: error.message, ...dataErrorBody(error) });
        }
        const statusCode = error.statusCode ?? 500;
        if (statusCode >= 500) {
            request.log.error(error);
            return reply.status(500).send({ error: "internal_error", message: "Internal Server Error" });
        }
        return reply.status(statusCode).send({ error: "invalid_request", message: error.message });
    });

    function calculate(body: unknown): CalculationReport {
        const request = parseCalculationRequest(body);

        let table = factors;
        if (request.factorsCsv) {
            const loaded = cache.load(request.factorsCsv);
            logger.debug({ digest: loaded.digest, hit: loaded.hit, rows: loaded.table.size }, "uploaded factor table");
            table = loaded.table;
        }

        return runCalculation(table, toActivityInput(request, defaults.region), {
            includeAnaesthetics: request.includeAnaesthetics ?? defaults.includeAnaesthetics,
            breakdown: request.breakdown,
            logger,
        });
    }

    app.get('/status', async () => {
        return {
            status: 'OK',
            timestamp: new Date().toISOString(),
            factorRows: factors.size,
        };
    });

    app.get('/regions', async () => {
        return {
            regions: REGIONS,
            defaultRegion: defaults.region,
            activities: ACTIVITIES.map(({ key, label, unit, group, scope }) => ({ key, label, unit, group, scope })),
        };
    });

    app.post('/calculate', async (request) => {
        return calculate(request.body);
    });

    app.post('/calculate/csv', async (request, reply) => {
        const report = calculate(request.body);
        return reply
            .header('content-type', 'text/csv; charset=utf-8')
            .header('content-disposition', `attachment; filename="${CSV_FILENAME}"`)
            .send(toCsv(report.metrics));
    });

    return app;
}
