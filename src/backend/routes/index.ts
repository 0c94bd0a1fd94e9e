// Route module exports
export { createTrackerRoutes, type TrackerRoutesContext } from './tracker';
export { createStatsRoutes, type StatsRoutesContext } from './stats';
export { createSessionsRoutes } from './sessions';
export { createSettingsRoutes, type SettingsRoutesContext } from './settings';
