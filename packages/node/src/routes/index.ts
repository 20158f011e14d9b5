/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createPoolRoutes } from "./pools.js";
export { createAccountRoutes } from "./accounts.js";
