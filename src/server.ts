/**
 * HTTP surface — POST /generate runs one pipeline per request.
 */
import type { Server } from 'http';
import express, { type NextFunction, type Request, type Response } from 'express';
import { PipelineError, errorMessage, type PipelineStage } from './errors.js';
import { logger } from './utils/logger.js';
import { GenerationRequestSchema, runPipeline, type PipelineDeps } from './pipeline/index.js';

const STAGE_LABEL: Record<PipelineStage, string> = {
  generation: 'LLM generation failed',
  synthesis:  'TTS failed',
  render:     'Video creation failed',
  publish:    'Upload/DB insert failed',
};

export function statusForStage(stage: PipelineStage): number {
  return stage === 'generation' ? 502 : 500;
}

export function createApp(deps: PipelineDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: '16kb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.post('/generate', async (req: Request, res: Response) => {
    const parsed = GenerationRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        ok: false,
        error: 'InvalidRequest',
        detail: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '),
      });
      return;
    }

    try {
      const result = await runPipeline(parsed.data, deps);
      res.json(result);
    } catch (err) {
      // Respond before alerting
      if (err instanceof PipelineError) {
        res.status(statusForStage(err.stage)).json({
          ok: false,
          stage: err.stage,
          error: err.code,
          detail: `${STAGE_LABEL[err.stage]}: ${err.message}`,
        });
        await deps.alerts.alert(`${STAGE_LABEL[err.stage]} (${err.code}) for "${parsed.data.topic}": ${err.message}`, 'critical');
        return;
      }
      logger.error('Server: unexpected pipeline error', { error: errorMessage(err) });
      res.status(500).json({ ok: false, stage: 'unknown', error: 'Unexpected', detail: errorMessage(err) });
      await deps.alerts.alert(`Unexpected pipeline error: ${errorMessage(err)}`, 'critical');
    }
  });

  // Malformed JSON bodies land here from express.json()
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.warn('Server: request rejected', { error: errorMessage(err) });
    res.status(400).json({ ok: false, error: 'InvalidRequest', detail: errorMessage(err) });
  });

  return app;
}

export function startServer(deps: PipelineDeps): Server {
  const app = createApp(deps);
  return app.listen(deps.config.port, () => {
    logger.info('Server: listening', { port: deps.config.port });
  });
}
