import { parseIndexPath, parseLevel } from '@arbor/core';
import type { Router } from '../router/router.js';
import { ok } from '../http/http_helpers.js';
import { body, pathParam, planIdParam, targetParam } from './route_helpers.js';
import {
  addTaskSchema,
  changeLevelSchema,
  completeTaskSchema,
  taskNotesSchema,
  type AddTaskBody,
  type ChangeLevelBody,
  type CompleteTaskBody,
  type TaskNotesBody,
} from './schemas.js';

export function registerTaskRoutes(router: Router): void {
  router.post('/api/plans/:id/tasks', async (request, { store }) => {
    const id = planIdParam(request);
    const input = body<AddTaskBody>(request, addTaskSchema);
    const parent = input.parent === undefined || input.parent === null ? null : parseIndexPath(input.parent);
    const result = await store.addTask(id, parent, {
      description: input.description,
      level: parseLevel(input.level),
      notes: input.notes ?? null,
    });
    return ok(result, 201);
  });

  router.delete('/api/plans/:id/tasks/:path', async (request, { store }) =>
    ok(await store.removeTask(planIdParam(request), pathParam(request))),
  );

  router.put('/api/plans/:id/tasks/:path/level', async (request, { store }) => {
    const id = planIdParam(request);
    const path = pathParam(request);
    const level = parseLevel(body<ChangeLevelBody>(request, changeLevelSchema).level);
    await store.changeLevel(id, path, level);
    return ok({ path, level });
  });

  router.post('/api/plans/:id/tasks/:path/lease', async (request, { store }) =>
    ok(await store.generateLease(planIdParam(request), targetParam(request))),
  );

  router.post('/api/plans/:id/tasks/:path/complete', async (request, { store }) => {
    const id = planIdParam(request);
    const options = body<CompleteTaskBody>(request, completeTaskSchema);
    return ok(await store.completeTask(id, targetParam(request), options));
  });

  router.post('/api/plans/:id/tasks/:path/uncomplete', async (request, { store }) => {
    const id = planIdParam(request);
    const path = pathParam(request);
    await store.uncompleteTask(id, path);
    return ok({ path, completed: false });
  });

  router.get('/api/plans/:id/tasks/:path/notes', async (request, { store }) => {
    const path = pathParam(request);
    return ok({ path, notes: await store.getNotes(planIdParam(request), path) });
  });

  router.put('/api/plans/:id/tasks/:path/notes', async (request, { store }) => {
    const id = planIdParam(request);
    const path = pathParam(request);
    const { notes } = body<TaskNotesBody>(request, taskNotesSchema);
    await store.setNotes(id, path, notes);
    return ok({ path, notes });
  });

  router.delete('/api/plans/:id/tasks/:path/notes', async (request, { store }) => {
    const id = planIdParam(request);
    const path = pathParam(request);
    await store.deleteNotes(id, path);
    return ok({ path, notes: null });
  });
}
