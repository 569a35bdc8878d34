export { createHealthRoutes, type HealthCheckResult, type HealthResponse } from './health.js';
export { createWidgetRoutes } from './widget.js';
export { createWidgetStreamRoutes } from './widget-stream.js';
export { createAgentRoutes } from './agent.js';
export { createAdminRoutes, type EscalationDefaults } from './admin.js';
