import path from 'path';
import type { NextFunction, Request, Response } from 'express';

export const DEFAULT_VIEWS_DIR = path.resolve(__dirname, '..', '..', 'views');

export function createPageHandler(viewsDir: string, page: 'index.html' | 'app.html') {
  return (_req: Request, res: Response, next: NextFunction) => {
    res.sendFile(path.join(viewsDir, page), (error) => {
      if (error) {
        next(error);
      }
    });
  };
}
