import { describe, it, expect } from 'vitest';
import { SchemaValidationCache, validateInput } from './schema_validator.js';
import type { SchemaObject } from './schema_validator.js';
import { InvalidOperationError } from '../errors/index.js';

const schema: SchemaObject = {
  type: 'object',
  properties: {
    goal: { type: 'string', minLength: 1 },
    port: { type: 'integer' },
  },
  required: ['goal'],
  additionalProperties: false,
};

describe('validateInput', () => {
  it('should return valid input unchanged', () => {
    const input = { goal: 'Ship it' };
    expect(validateInput<{ goal: string }>(schema, input)).toBe(input);
  });

  it('should report every violation as an invalid operation', () => {
    let caught: unknown;
    try {
      validateInput(schema, { goal: '', extra: true }, 'plan body');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidOperationError);
    const message = caught instanceof Error ? caught.message : '';
    expect(message.startsWith('Invalid plan body: ')).toBe(true);
    expect(message).toContain('(root) must not have property "extra"');
    expect(message).toContain('/goal must NOT have fewer than 1 characters');
  });

  it('should coerce strings when asked', () => {
    const input: Record<string, unknown> = { goal: 'g', port: '8080' };
    validateInput(schema, input, 'config', { coerceTypes: true });
    expect(input['port']).toBe(8080);
  });

  it('should cache compiled validators per schema', () => {
    expect(SchemaValidationCache.getValidator(schema)).toBe(SchemaValidationCache.getValidator(schema));
  });
});
