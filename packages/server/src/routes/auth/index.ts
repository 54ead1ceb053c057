export { createLoginRoutes, loginSchema } from './login.js';
export type { LoginRouteOptions } from './login.js';
export { createRefreshRoutes, refreshSchema } from './refresh.js';
export type { RefreshRouteOptions } from './refresh.js';
export { createLogoutRoutes, logoutSchema } from './logout.js';
export type { LogoutRouteOptions } from './logout.js';
export { createMeRoutes } from './me.js';
export type { MeRouteOptions } from './me.js';
export { toTokenPairResponse } from './token-response.js';
