/**
 * Dashboard - HTTP view and control surface for an engine
 */

export {
  DashboardServer,
  startDashboard,
  DEFAULT_DASHBOARD_CONFIG,
  type DashboardConfig,
} from './server.js';

export { setupRoutes, type ControlAction } from './routes.js';
