export { default as simulationRoutes } from './simulation-routes.js';
export { default as replayRoutes } from './replay-routes.js';
export { default as maintenanceRoutes } from './maintenance-routes.js';
