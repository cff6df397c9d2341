// src/http/requestContext.ts

/**
 * Request fields added by this service's middleware (module augmentation).
 *
 * Modules that read these fields pull it in with `import type {} from`, which leaves
 * nothing behind in the emitted JavaScript.
 */

declare module 'express-serve-static-core' {
  interface Request {
    /** Set by correlationIdMiddleware. */
    correlationId?: string;
    /** Set by validateParameters once every declared parameter validated. */
    validatedParameters?: Record<string, unknown>;
  }
}

export {};
