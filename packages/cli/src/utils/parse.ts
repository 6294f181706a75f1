import { InvalidOperationError, parseIndexPath, parseLevel, type IndexPath, type Level } from '@arbor/core';

/** Commander option parser for positive integers (`--lease 7`, `--port 3000`). */
export function parseInteger(value: string, name: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidOperationError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return Number(value);
}

/** Paths typed on the command line: "0.1", "0,1" or "root". */
export function parsePathArgument(value: string): IndexPath {
  return parseIndexPath(value);
}

export function parseLevelArgument(value: string): Level {
  return parseLevel(value);
}
