/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { MintsplitService } from "../services/mintsplit-service.js";

/**
 * Hono environment type for the mintsplit app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The service every API route delegates to */
    service: MintsplitService;
  };
}

/**
 * Environment of a route behind `validateBody(schema)`.
 */
export type ValidatedEnv<T> = AppEnv & {
  Variables: {
    validatedBody: T;
  };
};
