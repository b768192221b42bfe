export { default as telemetryPlugin } from './telemetry-plugin.js';
export type { TelemetryPluginOptions } from './telemetry-plugin.js';
export { default as eventRoutes } from './event-routes.js';
