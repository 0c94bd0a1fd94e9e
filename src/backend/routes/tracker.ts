import { Router } from 'express';
import type { SessionTracker } from '../sessionTracker';
import { activityPayloadSchema, formatRouteError, z } from './validation';

export type TrackerRoutesContext = {
  tracker: SessionTracker;
};

const closeProjectSchema = z.object({
  projectPath: z.string().trim().min(1)
});

export function createTrackerRoutes(ctx: TrackerRoutesContext): Router {
  const router = Router();
  const { tracker } = ctx;

  router.post('/activity', (req, res) => {
    try {
      const { timestamp, ...target } = activityPayloadSchema.parse(req.body ?? {});
      const accepted = tracker.onActivity(target, timestamp);
      res.json({ ok: true, accepted });
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.post('/projects/close', async (req, res) => {
    try {
      const { projectPath } = closeProjectSchema.parse(req.body ?? {});
      await tracker.stopProjectTracking(projectPath);
      res.json({ ok: true });
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.post('/tracker/flush', async (_req, res) => {
    try {
      await tracker.forcePersistSessions();
      res.json({ ok: true });
    } catch (error) {
      res.status(500).json({ error: formatRouteError(error) });
    }
  });

  router.get('/tracker/status', (_req, res) => {
    res.json(tracker.status());
  });

  return router;
}
