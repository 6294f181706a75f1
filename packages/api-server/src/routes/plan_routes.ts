import { getGuide, parseIndexPath } from '@arbor/core';
import type { Router } from '../router/router.js';
import { ok } from '../http/http_helpers.js';
import { body, planIdParam } from './route_helpers.js';
import {
  createPlanSchema,
  moveSchema,
  planNotesSchema,
  type CreatePlanBody,
  type MoveBody,
  type PlanNotesBody,
} from './schemas.js';

export function registerPlanRoutes(router: Router): void {
  router.get('/health', async () => ok({ status: 'ok' }));

  router.get('/api/guide', async () => ok({ guide: getGuide('cli') }));

  router.get('/api/plans', async (_request, { store }) => ok(await store.listPlans()));

  router.post('/api/plans', async (request, { store }) => {
    const { goal, notes } = body<CreatePlanBody>(request, createPlanSchema);
    const id = await store.createPlan(goal, notes ?? null);
    return ok({ id }, 201);
  });

  router.get('/api/plans/:id', async (request, { store }) => ok(await store.getPlan(planIdParam(request))));

  router.delete('/api/plans/:id', async (request, { store }) => {
    const id = planIdParam(request);
    await store.deletePlan(id);
    return ok({ id, deleted: true });
  });

  router.put('/api/plans/:id/notes', async (request, { store }) => {
    const id = planIdParam(request);
    const { notes } = body<PlanNotesBody>(request, planNotesSchema);
    await store.updatePlanNotes(id, notes);
    return ok({ id, notes });
  });

  router.get('/api/plans/:id/current', async (request, { store }) => ok(await store.getCurrent(planIdParam(request))));

  router.get('/api/plans/:id/distilled', async (request, { store }) =>
    ok(await store.getDistilledContext(planIdParam(request))),
  );

  router.post('/api/plans/:id/move', async (request, { store }) => {
    const id = planIdParam(request);
    const { path } = body<MoveBody>(request, moveSchema);
    return ok(await store.moveTo(id, parseIndexPath(path)));
  });
}
