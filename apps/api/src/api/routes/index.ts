export { registerAuthRoutes, type AuthRoutesDeps, RESET_REQUESTED_MESSAGE, INVALID_LOGIN_MESSAGE } from './auth.js';
export { registerUserRoutes, type UserRoutesDeps } from './users.js';
export { registerLinkRoutes, type LinkRoutesDeps } from './links.js';
export { registerAnalyticsRoutes, type AnalyticsRoutesDeps } from './analytics.js';
export { registerAdminRoutes, type AdminRoutesDeps } from './admin.js';
export { registerServiceRoutes, type ServiceRoutesDeps, API_VERSION } from './service.js';
