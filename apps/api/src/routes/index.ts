export { healthRoutes, type HealthRouteOptions } from './health.js';
export { adminRoutes, type AdminRouteOptions } from './admin.js';
export { telegramRoutes, type TelegramRouteOptions } from './telegram.js';
