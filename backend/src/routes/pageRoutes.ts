import { Router } from 'express';
import { createPageHandler } from '../controllers/pageController';

export function createPageRouter(viewsDir: string): Router {
  const router = Router();

  // Landing page
  router.get('/', createPageHandler(viewsDir, 'index.html'));
  // Multi-step data entry application
  router.get('/app', createPageHandler(viewsDir, 'app.html'));

  return router;
}
