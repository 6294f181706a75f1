import { Router } from '../router/router.js';
import { registerPlanRoutes } from './plan_routes.js';
import { registerTaskRoutes } from './task_routes.js';

export function createApiRouter(): Router {
  const router = new Router();
  registerPlanRoutes(router);
  registerTaskRoutes(router);
  return router;
}

export { registerPlanRoutes, registerTaskRoutes };
