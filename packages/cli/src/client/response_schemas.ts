import type { SchemaObject } from '@arbor/core';

/**
 * Shapes the client checks on the way in. They pin the fields the CLI
 * reads; nested task trees are trusted once their root shape matches.
 */

const indexPath: SchemaObject = { type: 'array', items: { type: 'integer', minimum: 0 } };
const nullableText: SchemaObject = { type: ['string', 'null'] };

export const envelopeSchema: SchemaObject = {
  type: 'object',
  required: ['success'],
  properties: {
    success: { type: 'boolean' },
    error: {
      type: 'object',
      required: ['code', 'message'],
      properties: { code: { type: 'string' }, message: { type: 'string' } },
    },
  },
};

export const taskSchema: SchemaObject = {
  type: 'object',
  required: ['description', 'level', 'notes', 'completed', 'summary', 'lease', 'children'],
  properties: {
    description: { type: 'string' },
    level: { type: 'string' },
    notes: nullableText,
    completed: { type: 'boolean' },
    summary: nullableText,
    lease: { type: ['integer', 'null'] },
    children: { type: 'array', items: { type: 'object' } },
  },
};

export const healthSchema: SchemaObject = {
  type: 'object',
  required: ['status'],
  properties: { status: { type: 'string' } },
};

export const planListSchema: SchemaObject = {
  type: 'array',
  items: {
    type: 'object',
    required: ['id', 'goal'],
    properties: { id: { type: 'integer' }, goal: { type: 'string' } },
  },
};

export const createdPlanSchema: SchemaObject = {
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'integer', minimum: 1 } },
};

export const planSchema: SchemaObject = {
  type: 'object',
  required: ['id', 'goal', 'notes', 'createdAt', 'root', 'current', 'history'],
  properties: {
    id: { type: 'integer' },
    goal: { type: 'string' },
    notes: nullableText,
    createdAt: { type: 'string' },
    root: { type: 'array', items: taskSchema },
    current: indexPath,
    history: { type: 'array', items: { type: 'object', required: ['timestamp', 'action', 'details'] } },
  },
};

export const currentViewSchema: SchemaObject = {
  type: 'object',
  required: ['planId', 'path', 'task'],
  properties: {
    planId: { type: 'integer' },
    path: indexPath,
    task: { anyOf: [{ type: 'null' }, taskSchema] },
  },
};

export const distilledSchema: SchemaObject = {
  type: 'object',
  required: ['planId', 'goal', 'planNotes', 'usage', 'current', 'ancestors', 'children', 'taskTree', 'levels', 'history'],
  properties: {
    planId: { type: 'integer' },
    goal: { type: 'string' },
    planNotes: nullableText,
    usage: {
      type: 'object',
      required: ['totalTasks', 'completedTasks', 'summary'],
    },
    current: {
      type: 'object',
      required: ['path', 'task', 'level'],
      properties: { path: indexPath },
    },
    ancestors: { type: 'array' },
    children: { type: 'array' },
    taskTree: { type: 'array' },
    levels: { type: 'array' },
    history: { type: 'array' },
  },
};

export const pathTaskSchema: SchemaObject = {
  type: 'object',
  required: ['path', 'task'],
  properties: { path: indexPath, task: taskSchema },
};

export const leaseGrantSchema: SchemaObject = {
  type: 'object',
  required: ['planId', 'path', 'lease', 'suggestions'],
  properties: {
    planId: { type: 'integer' },
    path: indexPath,
    lease: { type: 'integer' },
    suggestions: { type: 'array', items: { type: 'string' } },
  },
};

export const notesSchema: SchemaObject = {
  type: 'object',
  required: ['notes'],
  properties: { notes: nullableText },
};
