import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { CONFIG, FINES, RATE_LIMIT, defaultProbabilities } from './constants.js';
import { InvalidConfigurationError } from './errors.js';
import { simulate, summarize } from './simulation/engine.js';
import { formatLog } from './simulation/report.js';
import { DAY_TYPES, type SimulationOptions } from './simulation/types.js';

export interface AppOptions {
  logger?: boolean | FastifyBaseLogger;
  rateLimit?: { max: number; timeWindow: string };
}

const simulateSchema = {
  body: {
    type: 'object',
    required: ['dayType', 'locations'],
    additionalProperties: false,
    properties: {
      dayType: { type: 'string', enum: DAY_TYPES },
      // lower bound is checked by the simulation itself
      locations: { type: 'integer', maximum: CONFIG.MAX_LOCATIONS },
      seed: { type: 'integer' },
      probabilities: {
        type: 'object',
        additionalProperties: false,
        properties: {
          scheduledWaste: { type: 'number' },
          contamination: { type: 'number' },
        },
      },
    },
  },
};

export function buildApp(opts: AppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: opts.logger === undefined || opts.logger === true ? { level: CONFIG.LOG_LEVEL } : opts.logger,
    bodyLimit: 32 * 1024,
    // reject rather than strip or coerce
    ajv: { customOptions: { removeAdditional: false, coerceTypes: false } },
  });

  app.register(helmet);
  app.register(rateLimit, opts.rateLimit ?? RATE_LIMIT);

  // Simple in-memory metrics
  const metrics = { runs: 0, locationsVisited: 0, finesIssued: 0 };

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof InvalidConfigurationError) {
      req.log.info({ code: error.code }, error.message);
      return reply.code(400).send({ ok: false, reason: 'invalid_configuration', message: error.message });
    }
    // schema failures, unparsable bodies and bad content types
    if (error.validation || error.statusCode === 400) {
      return reply.code(400).send({ ok: false, reason: 'invalid_request', message: error.message });
    }
    if (error.statusCode === undefined || error.statusCode >= 500) req.log.error(error);
    else req.log.info({ statusCode: error.statusCode }, error.message);
    return reply.send(error);
  });

  app.get('/api/health', async () => ({ ok: true, uptime: process.uptime() }));

  app.get('/api/config', async () => ({
    probabilities: defaultProbabilities(),
    fines: FINES,
    defaultLocations: CONFIG.DEFAULT_LOCATIONS,
    maxLocations: CONFIG.MAX_LOCATIONS,
    dayTypes: DAY_TYPES,
  }));

  app.get('/api/metrics', async () => metrics);

  app.post<{ Body: SimulationOptions }>('/api/simulate', { schema: simulateSchema }, async (req) => {
    const result = simulate(req.body);
    metrics.runs++;
    metrics.locationsVisited += result.locationCount;
    metrics.finesIssued += result.totalFines;
    req.log.debug({ dayType: result.dayType, locations: result.locationCount, totalFines: result.totalFines }, 'simulation finished');
    return { ok: true, result, summary: summarize(result), log: formatLog(result) };
  });

  return app;
}
