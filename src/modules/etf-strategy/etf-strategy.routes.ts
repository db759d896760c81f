/**
 * ETF STRATEGY ROUTES
 *
 * Prefix: /api/etf-strategy
 * Bodies are validated with zod; ZodError maps to 400 VALIDATION_ERROR in
 * the global error handler.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { renderReportMarkdown } from './etf-strategy.renderer.js';
import type { EtfStrategyService } from './etf-strategy.service.js';
import type { SourceRegistry } from './sources/source.registry.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const RiskProfileSchema = z.enum(['conservative', 'moderate', 'aggressive']);
const HeadlinesSchema = z.array(z.string());

const AnalyzeBodySchema = z
  .object({
    headlines: HeadlinesSchema.optional(),
    mode: z.enum(['STRICT', 'LENIENT']).optional(),
    riskProfile: RiskProfileSchema.optional(),
  })
  .strict();

const AnalyzeQuerySchema = z.object({
  format: z.enum(['json', 'markdown']).default('json'),
});

const HeadlinesBodySchema = z.object({
  headlines: HeadlinesSchema,
});

const ScoreBodySchema = z.object({
  indexChangePct: z.number().finite(),
  premiumPct: z.number().finite(),
  futuresChangePct: z.number().finite(),
  hasEvent: z.boolean().default(false),
  riskProfile: RiskProfileSchema.optional(),
});

// ═══════════════════════════════════════════════════════════════
// REGISTER
// ═══════════════════════════════════════════════════════════════

export interface EtfStrategyRouteDeps {
  service: EtfStrategyService;
  registry: SourceRegistry;
}

export async function registerEtfStrategyRoutes(
  fastify: FastifyInstance,
  deps: EtfStrategyRouteDeps,
): Promise<void> {
  const { service, registry } = deps;

  /**
   * POST /api/etf-strategy/analyze?format=json|markdown
   *
   * Full run: live signals, decisions, broad market, themes.
   */
  fastify.post('/api/etf-strategy/analyze', async (req, reply) => {
    const body = AnalyzeBodySchema.parse(req.body ?? {});
    const { format } = AnalyzeQuerySchema.parse(req.query ?? {});

    const report = await service.analyze(body);

    if (format === 'markdown') {
      return reply.type('text/markdown; charset=utf-8').send(renderReportMarkdown(report));
    }
    return { ok: true, report };
  });

  /**
   * POST /api/etf-strategy/themes
   */
  fastify.post('/api/etf-strategy/themes', async (req) => {
    const { headlines } = HeadlinesBodySchema.parse(req.body);
    return { ok: true, themes: service.rankThemes(headlines) };
  });

  /**
   * POST /api/etf-strategy/events
   */
  fastify.post('/api/etf-strategy/events', async (req) => {
    const { headlines } = HeadlinesBodySchema.parse(req.body);
    return { ok: true, events: service.detectEvents(headlines) };
  });

  /**
   * POST /api/etf-strategy/score
   *
   * Offline scoring of caller-supplied signal values, no market data.
   */
  fastify.post('/api/etf-strategy/score', async (req) => {
    const body = ScoreBodySchema.parse(req.body);
    const { score, plan } = service.evaluate(body);
    return { ok: true, score, plan };
  });

  /**
   * GET /api/etf-strategy/sources/health
   */
  fastify.get('/api/etf-strategy/sources/health', async () => {
    return {
      ok: true,
      mode: service.mode,
      sources: registry.listHealth(),
    };
  });
}
