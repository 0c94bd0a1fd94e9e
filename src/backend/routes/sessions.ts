import { Router } from 'express';
import type { ExportImportService } from '../exportImport';
import { formatRouteError, parseRangeQuery } from './validation';

export function createSessionsRoutes(transfer: ExportImportService): Router {
  const router = Router();

  router.get('/export', (req, res) => {
    try {
      const { start, end } = parseRangeQuery(req.query);
      res.json(transfer.exportData(start && end ? { start, end } : undefined));
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.post('/import', async (req, res) => {
    const result = await transfer.importData(req.body);
    res.status(result.success ? 200 : 400).json(result);
  });

  return router;
}
