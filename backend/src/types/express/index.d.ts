import 'express';
import type { ScopedLogger } from '../../utils/logger';

// Declaration merging: the request context middleware attaches these to every request.
declare global {
  namespace Express {
    export interface Request {
      id?: string;
      log?: ScopedLogger;
    }
  }
}
