import fastify from "fastify";
import {
    type FactorRegistry,
    FactorNotFoundError,
    InvalidInputError,
    type ReportingPeriod,
    buildFootprintResponse,
    buildOffsetResponse,
    buildRefinedResponse,
    buildSuggestionsResponse,
    calculateBaseline,
    createCalculationContext,
    rankSuggestions,
    recommendOffsets,
    refine,
} from "@carbontally/emission-core";

export interface ServerOptions {
    registry: FactorRegistry;
    period?: ReportingPeriod;
    clock?: () => Date;
    /** false silences the request log (tests) */
    logger?: boolean | { level: string };
}

const activityBody = { body: { type: "object" } };

export async function buildServer(options: ServerOptions) {
    const { registry, period = "as-reported", clock = () => new Date() } = options;
    const app = fastify({ logger: options.logger ?? true });

    // one table per request: a SIGHUP reload never lands mid-calculation
    const contextForRequest = () => createCalculationContext(registry.current(), { period, clock });

    app.setErrorHandler((error, request, reply) => {
        if (error instanceof InvalidInputError) {
            return reply.status(400).send({ error: error.code, field: error.field, message: error.message });
        }
        if (error instanceof FactorNotFoundError) {
            request.log.warn({ category: error.category, subtype: error.subtype }, "missing emission factor");
            return reply.status(422).send({
                error: error.code,
                message: `we don't yet support this activity type: ${error.category}/${error.subtype}`,
            });
        }
        if (error.validation) {
            return reply.status(400).send({ error: "INVALID_INPUT", message: error.message });
        }
        request.log.error({ err: error }, "request failed");
        return reply.status(500).send({ error: "INTERNAL", message: "footprint calculation failed" });
    });

    app.get('/status', async () => {
        return {
            status: 'OK',
            timestamp: clock().toISOString(),
            factors: {
                generation: registry.generation,
                entries: registry.current().size,
            },
        };
    });

    app.post('/api/calc', { schema: activityBody }, async (request) => {
        return buildFootprintResponse(calculateBaseline(request.body, contextForRequest()));
    });

    app.post('/api/refine', { schema: activityBody }, async (request) => {
        const baseline = calculateBaseline(request.body, contextForRequest());
        return buildRefinedResponse(refine(baseline, request.body));
    });

    // no type on footprint_kg: ajv would coerce true, "192" or [5] into a number
    app.post<{ Body: { footprint_kg: unknown } }>('/api/offset', {
        schema: {
            body: {
                type: "object",
                required: ["footprint_kg"],
            },
        },
    }, async (request) => {
        const footprintKg = request.body.footprint_kg;
        if (typeof footprintKg !== "number") {
            throw new InvalidInputError("footprint_kg", "must be a number");
        }
        return buildOffsetResponse(footprintKg, recommendOffsets(footprintKg));
    });

    app.post<{ Body: { breakdown: unknown } }>('/api/suggestions', {
        schema: {
            body: {
                type: "object",
                required: ["breakdown"],
            },
        },
    }, async (request) => {
        return { suggestions: buildSuggestionsResponse(rankSuggestions(request.body.breakdown)) };
    });

    return app;
}
