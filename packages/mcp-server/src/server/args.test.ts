import { describe, it, expect } from 'vitest';
import { parseMcpArgs } from './args.js';

describe('parseMcpArgs', () => {
  it('should default to stdio with no flags', () => {
    expect(parseMcpArgs([])).toEqual({});
  });

  it('should accept separate and inline values', () => {
    expect(parseMcpArgs(['--port', '8080', '--expose=3001', '--example', '--host', '0.0.0.0'])).toEqual({
      port: 8080,
      expose: 3001,
      example: true,
      host: '0.0.0.0',
    });
  });

  it('should reject a non-numeric port', () => {
    expect(() => parseMcpArgs(['--port', 'abc'])).toThrow('--port requires a numeric port');
  });

  it('should reject a missing port value', () => {
    expect(() => parseMcpArgs(['--expose'])).toThrow('--expose requires a numeric port');
  });

  it('should reject unknown flags', () => {
    expect(() => parseMcpArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });
});
