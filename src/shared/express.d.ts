/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 */
declare global {
  namespace Express {
    interface Request {
      /** Set by requestTimer middleware; used for `meta.totalTimeMs`. */
      requestStartTime?: number;
    }
  }
}

export {};
