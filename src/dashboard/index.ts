/**
 * Dashboard module exports
 */

export {
  APIServer,
  APIServerConfig,
  APIServerDependencies,
  HealthReport,
  parseLimit,
  redactConfig
} from './api-server';
export { DashboardService, DashboardServiceConfig, DEFAULT_RECENT_LIMIT } from './dashboard-service';

// Re-export dashboard types
export * from '../types/dashboard';
