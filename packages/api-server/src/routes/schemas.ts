import type { SchemaObject } from '@arbor/core';

/** Request bodies, validated before any engine call. */

const pathValue = { type: ['array', 'string', 'integer'] };
const levelValue = { type: ['string', 'integer'] };
const optionalText = { type: ['string', 'null'] };

export const createPlanSchema: SchemaObject = {
  type: 'object',
  properties: {
    goal: { type: 'string', minLength: 1 },
    notes: optionalText,
  },
  required: ['goal'],
  additionalProperties: false,
};

export const planNotesSchema: SchemaObject = {
  type: 'object',
  properties: { notes: optionalText },
  required: ['notes'],
  additionalProperties: false,
};

export const moveSchema: SchemaObject = {
  type: 'object',
  properties: { path: pathValue },
  required: ['path'],
  additionalProperties: false,
};

export const addTaskSchema: SchemaObject = {
  type: 'object',
  properties: {
    parent: { type: ['array', 'string', 'integer', 'null'] },
    description: { type: 'string', minLength: 1 },
    level: levelValue,
    notes: optionalText,
  },
  required: ['description', 'level'],
  additionalProperties: false,
};

export const changeLevelSchema: SchemaObject = {
  type: 'object',
  properties: { level: levelValue },
  required: ['level'],
  additionalProperties: false,
};

export const completeTaskSchema: SchemaObject = {
  type: 'object',
  properties: {
    lease: { type: 'integer', minimum: 1 },
    force: { type: 'boolean' },
    summary: optionalText,
  },
  additionalProperties: false,
};

export const taskNotesSchema: SchemaObject = {
  type: 'object',
  properties: { notes: { type: 'string' } },
  required: ['notes'],
  additionalProperties: false,
};

export interface CreatePlanBody {
  goal: string;
  notes?: string | null;
}

export interface PlanNotesBody {
  notes: string | null;
}

export interface MoveBody {
  path: unknown;
}

export interface AddTaskBody {
  parent?: unknown;
  description: string;
  level: string | number;
  notes?: string | null;
}

export interface ChangeLevelBody {
  level: string | number;
}

export interface CompleteTaskBody {
  lease?: number;
  force?: boolean;
  summary?: string | null;
}

export interface TaskNotesBody {
  notes: string;
}
