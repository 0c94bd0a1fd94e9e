import { Router } from 'express';
import type { AggregationService } from '../aggregation';
import type { SummaryService } from '../summary';
import { RECENT_ACTIVITY_DAYS } from '../defaults';
import {
  coerceClampedInt,
  formatRouteError,
  parseOptionalNonEmptyString,
  parseRangeQuery,
  parseRequiredRangeQuery
} from './validation';

export type StatsRoutesContext = {
  aggregation: AggregationService;
  summary: SummaryService;
};

export function createStatsRoutes(ctx: StatsRoutesContext): Router {
  const router = Router();
  const { aggregation, summary } = ctx;

  router.get('/total', (req, res) => {
    try {
      const project = parseOptionalNonEmptyString(req.query.project);
      res.json({ seconds: aggregation.totalCodingTime(project) });
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/period', (req, res) => {
    try {
      const { start, end } = parseRequiredRangeQuery(req.query);
      const project = parseOptionalNonEmptyString(req.query.project);
      res.json({ seconds: aggregation.codingTimeForPeriod(start, end, project) });
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/heatmap', (req, res) => {
    try {
      const { start, end } = parseRequiredRangeQuery(req.query);
      res.json(aggregation.dailyCodingTimeForHeatmap(start, end));
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/streaks', (req, res) => {
    try {
      const { start, end } = parseRequiredRangeQuery(req.query);
      res.json(aggregation.codingStreaks(start, end));
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/calendar', (req, res) => {
    try {
      const { start, end } = parseRequiredRangeQuery(req.query);
      res.json(aggregation.activityCalendar(start, end));
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/recent', (req, res) => {
    const days = coerceClampedInt(req.query.days, RECENT_ACTIVITY_DAYS, { min: 1, max: 366 });
    res.json(aggregation.recentActivity(days));
  });

  router.get('/hourly/daily', (req, res) => {
    try {
      const { start, end } = parseRangeQuery(req.query);
      res.json(aggregation.dailyHourDistribution(start, end));
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/hourly/overall', (req, res) => {
    try {
      const { start, end } = parseRangeQuery(req.query);
      res.json(aggregation.overallHourlyDistribution(start, end));
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/languages', (req, res) => {
    try {
      const { start, end } = parseRangeQuery(req.query);
      res.json(aggregation.languageDistribution(start, end));
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/projects', (req, res) => {
    try {
      const { start, end } = parseRangeQuery(req.query);
      res.json(aggregation.projectDistribution(start, end));
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/time-of-day', (req, res) => {
    try {
      const { start, end } = parseRangeQuery(req.query);
      res.json(aggregation.timeOfDayDistribution(start, end));
    } catch (error) {
      res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/summary', (_req, res) => {
    res.json(summary.computeSummary());
  });

  return router;
}
