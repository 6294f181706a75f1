import {
  isPlanErrorCode,
  planErrorFromCode,
  validateInput,
  type AddTaskResult,
  type CompleteTaskResult,
  type CurrentView,
  type DistilledContext,
  type IndexPath,
  type LeaseGrant,
  type Level,
  type PlanId,
  type PlanSnapshot,
  type PlanSummary,
  type SchemaObject,
  type TaskSnapshot,
} from '@arbor/core';
import type { AddTaskRequest, CompleteTaskRequest, FetchFn, IArborClient } from './arbor_client.types.js';
import {
  createdPlanSchema,
  currentViewSchema,
  distilledSchema,
  envelopeSchema,
  healthSchema,
  leaseGrantSchema,
  notesSchema,
  pathTaskSchema,
  planListSchema,
  planSchema,
  taskSchema,
} from './response_schemas.js';

interface Envelope {
  success: boolean;
  data?: unknown;
  error?: { code: string; message: string };
}

/**
 * Raised when the server cannot be reached or answers outside the envelope.
 */
export class ArborConnectionError extends Error {
  constructor(message: string, public readonly url: string) {
    super(message);
    this.name = 'ArborConnectionError';
    Object.setPrototypeOf(this, ArborConnectionError.prototype);
  }
}

/** Paths travel in the URL in comma form; the root is spelled "root". */
function pathSegment(path: IndexPath): string {
  return path.length === 0 ? 'root' : path.join(',');
}

/**
 * HTTP client for the api-server. Failures come back as the engine's own
 * error classes, rebuilt from the envelope's error code.
 */
export class ArborHttpClient implements IArborClient {
  readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(baseUrl: string, fetchFn: FetchFn = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetchFn = fetchFn;
  }

  async health(): Promise<{ status: string }> {
    return this.request('GET', '/health', healthSchema);
  }

  // ===== Plans =====

  async listPlans(): Promise<PlanSummary[]> {
    return this.request('GET', '/api/plans', planListSchema);
  }

  async createPlan(goal: string, notes?: string | null): Promise<PlanId> {
    const body = notes === undefined || notes === null ? { goal } : { goal, notes };
    const created = await this.request<{ id: PlanId }>('POST', '/api/plans', createdPlanSchema, body);
    return created.id;
  }

  async getPlan(planId: PlanId): Promise<PlanSnapshot> {
    return this.request('GET', `/api/plans/${planId}`, planSchema);
  }

  async deletePlan(planId: PlanId): Promise<void> {
    await this.send('DELETE', `/api/plans/${planId}`);
  }

  async updatePlanNotes(planId: PlanId, notes: string | null): Promise<void> {
    await this.send('PUT', `/api/plans/${planId}/notes`, { notes });
  }

  // ===== Focus =====

  async getCurrent(planId: PlanId): Promise<CurrentView> {
    return this.request('GET', `/api/plans/${planId}/current`, currentViewSchema);
  }

  async getDistilledContext(planId: PlanId): Promise<DistilledContext> {
    return this.request('GET', `/api/plans/${planId}/distilled`, distilledSchema);
  }

  async moveTo(planId: PlanId, path: IndexPath): Promise<CurrentView> {
    return this.request('POST', `/api/plans/${planId}/move`, currentViewSchema, { path: [...path] });
  }

  // ===== Tasks =====

  async addTask(planId: PlanId, request: AddTaskRequest): Promise<AddTaskResult> {
    return this.request('POST', `/api/plans/${planId}/tasks`, pathTaskSchema, {
      description: request.description,
      level: request.level,
      ...(request.notes !== undefined && request.notes !== null ? { notes: request.notes } : {}),
      ...(request.parent !== undefined ? { parent: [...request.parent] } : {}),
    });
  }

  async removeTask(planId: PlanId, path: IndexPath): Promise<TaskSnapshot> {
    return this.request('DELETE', this.taskUrl(planId, path), taskSchema);
  }

  async changeLevel(planId: PlanId, path: IndexPath, level: Level): Promise<void> {
    await this.send('PUT', `${this.taskUrl(planId, path)}/level`, { level });
  }

  /** A `null` path leases whatever task the server has in focus. */
  async generateLease(planId: PlanId, path: IndexPath | null): Promise<LeaseGrant> {
    return this.request('POST', `${this.taskUrl(planId, path)}/lease`, leaseGrantSchema);
  }

  async completeTask(planId: PlanId, path: IndexPath | null, request: CompleteTaskRequest): Promise<CompleteTaskResult> {
    return this.request('POST', `${this.taskUrl(planId, path)}/complete`, pathTaskSchema, request);
  }

  async uncompleteTask(planId: PlanId, path: IndexPath): Promise<void> {
    await this.send('POST', `${this.taskUrl(planId, path)}/uncomplete`);
  }

  async getNotes(planId: PlanId, path: IndexPath): Promise<string | null> {
    const result = await this.request<{ notes: string | null }>('GET', `${this.taskUrl(planId, path)}/notes`, notesSchema);
    return result.notes;
  }

  async setNotes(planId: PlanId, path: IndexPath, notes: string): Promise<void> {
    await this.send('PUT', `${this.taskUrl(planId, path)}/notes`, { notes });
  }

  async deleteNotes(planId: PlanId, path: IndexPath): Promise<void> {
    await this.send('DELETE', `${this.taskUrl(planId, path)}/notes`);
  }

  // ===== Transport =====

  private taskUrl(planId: PlanId, path: IndexPath | null): string {
    const segment = path === null ? 'current' : pathSegment(path);
    return `/api/plans/${planId}/tasks/${encodeURIComponent(segment)}`;
  }

  private async request<T>(method: string, route: string, schema: SchemaObject, body?: unknown): Promise<T> {
    const data = await this.send(method, route, body);
    return validateInput<T>(schema, data, `response from ${method} ${route}`);
  }

  /** Performs the call and unwraps the envelope, returning `data`. */
  private async send(method: string, route: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${route}`;
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: body === undefined ? { Accept: 'application/json' } : { Accept: 'application/json', 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ArborConnectionError(`Cannot reach arbor server at ${this.baseUrl}: ${reason}`, url);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new ArborConnectionError(`Server answered ${response.status} without a JSON body`, url);
    }

    const envelope = validateInput<Envelope>(envelopeSchema, payload, `response from ${method} ${route}`);
    if (envelope.success) {
      return envelope.data;
    }

    const code = envelope.error?.code;
    const message = envelope.error?.message ?? `Request failed with status ${response.status}`;
    if (isPlanErrorCode(code)) {
      throw planErrorFromCode(code, message);
    }
    throw new ArborConnectionError(`${code ?? 'ERROR'}: ${message}`, url);
  }
}
