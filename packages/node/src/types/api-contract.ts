/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

/**
 * Hono environment type for the Ballast app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 * Route-specific variables (validated body, caller) are added to the
 * environment by the middleware that sets them.
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;
  };
}

/** Environment of a handler behind `validateBody(schema)`. */
export interface WithBody<T> {
  Variables: {
    validatedBody: T;
  };
}

/** Environment of a handler behind `requireCaller()`. */
export interface WithCaller {
  Variables: {
    caller: string;
  };
}
