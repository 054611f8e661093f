/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * requestTimer stamps the arrival time; TransportController reads it back
 * to report meta.totalTimeMs on trip responses.
 */
declare global {
  namespace Express {
    interface Request {
      requestStartTime?: number;
    }
  }
}

export {};
