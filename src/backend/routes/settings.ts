import { Router } from 'express';
import type { SettingsService } from '../settings';
import { formatRouteError, z } from './validation';

export type SettingsRoutesContext = {
  settings: SettingsService;
  onIdleThresholdChanged?: (seconds: number) => Promise<void> | void;
};

const idleThresholdSchema = z.object({
  threshold: z.coerce.number().int().min(1).max(3600)
});

const summaryThresholdSchema = z.object({
  threshold: z.coerce.number().int().min(1)
});

export function createSettingsRoutes(ctx: SettingsRoutesContext): Router {
  const router = Router();
  const { settings } = ctx;

  router.get('/idle-threshold', (_req, res) => {
    res.json({ threshold: settings.getIdleThreshold() });
  });

  router.post('/idle-threshold', async (req, res) => {
    let threshold: number;
    try {
      threshold = idleThresholdSchema.parse(req.body ?? {}).threshold;
    } catch (error) {
      return res.status(400).json({ error: formatRouteError(error) });
    }
    const previous = settings.getIdleThreshold();
    settings.setIdleThreshold(threshold);
    if (previous !== threshold) {
      try {
        await ctx.onIdleThresholdChanged?.(threshold);
      } catch (error) {
        return res.status(500).json({ error: formatRouteError(error) });
      }
    }
    res.json({ ok: true, threshold });
  });

  router.get('/summary-threshold', (_req, res) => {
    res.json({ threshold: settings.getSummaryInMemoryThreshold() });
  });

  router.post('/summary-threshold', (req, res) => {
    const parsed = summaryThresholdSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: formatRouteError(parsed.error) });
    }
    settings.setSummaryInMemoryThreshold(parsed.data.threshold);
    res.json({ ok: true, threshold: parsed.data.threshold });
  });

  return router;
}
