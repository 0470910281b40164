/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createMintingRoutes } from "./minting.js";
export { createEquityRoutes } from "./equity.js";
export { createEventRoutes } from "./events.js";
