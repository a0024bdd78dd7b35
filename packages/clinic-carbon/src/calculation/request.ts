import { z } from "zod";
import {
    ACTIVITIES,
    REGIONS,
    isActivityKey,
    type ActivityInput,
    type ActivityQuantities,
    type Region,
} from "@clinic-carbon/emission-core";

const quantity = z.number().finite().nonnegative();

export const calculationRequestSchema = z.object({
    region: z.enum(REGIONS).optional(),
    fte: quantity,
    quantities: z.record(z.string(), quantity).default({}).superRefine((quantities, ctx) => {
        for (const key of Object.keys(quantities)) {
            if (!isActivityKey(key)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `unknown activity '${key}'` });
            }
        }
    }),
    includeAnaesthetics: z.boolean().optional(),
    facility: z.object({
        name: z.string().max(200).optional(),
        reportingYear: z.string().max(20).optional(),
    }).strict().optional(),
    breakdown: z.enum(["groups", "combined", "lines"]).optional(),
    // an uploaded factor table, as CSV text
    factorsCsv: z.string().min(1).optional(),
}).strict();

export type CalculationRequest = z.infer<typeof calculationRequestSchema>;

export function parseCalculationRequest(body: unknown): CalculationRequest {
    return calculationRequestSchema.parse(body);
}

export function pickQuantities(raw: Record<string, number>): ActivityQuantities {
    const quantities: ActivityQuantities = {};
    for (const activity of ACTIVITIES) {
        const value = raw[activity.key];
        if (value !== undefined) quantities[activity.key] = value;
    }
    return quantities;
}

export function toActivityInput(request: CalculationRequest, defaultRegion: Region): ActivityInput {
    return {
        region: request.region ?? defaultRegion,
        fte: request.fte,
        quantities: pickQuantities(request.quantities),
        facility: request.facility,
    };
}
