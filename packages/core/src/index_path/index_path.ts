import { InvalidOperationError } from '../errors/index.js';

/**
 * Position of a task in a plan: child offsets starting from the root.
 * The empty path denotes the root itself.
 */
export type IndexPath = readonly number[];

export const ROOT_PATH: IndexPath = Object.freeze([]);

function isIndex(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Parses a path received at an adapter boundary. Accepts an array of
 * non-negative integers, or a string separated by "," or "." ("0,1,2",
 * "0.1.2"); "" and "root" denote the root.
 */
export function parseIndexPath(input: unknown): IndexPath {
  if (Array.isArray(input)) {
    const path: number[] = [];
    for (const segment of input) {
      if (!isIndex(segment)) {
        throw new InvalidOperationError(`Invalid index path ${JSON.stringify(input)}: segments must be non-negative integers`);
      }
      path.push(segment);
    }
    return path;
  }

  if (typeof input === 'number') {
    return parseIndexPath([input]);
  }

  if (typeof input !== 'string') {
    throw new InvalidOperationError(`Invalid index path ${JSON.stringify(input)}`);
  }

  const trimmed = input.trim();
  if (trimmed === '' || trimmed.toLowerCase() === 'root') {
    return ROOT_PATH;
  }

  return trimmed.split(/[.,]/).map((segment) => {
    const text = segment.trim();
    if (!/^\d+$/.test(text)) {
      throw new InvalidOperationError(`Invalid index path "${input}": "${text}" is not a non-negative integer`);
    }
    const value = Number(text);
    if (!Number.isSafeInteger(value)) {
      throw new InvalidOperationError(`Invalid index path "${input}": "${text}" is out of range`);
    }
    return value;
  });
}

/** Dotted display form, "root" for the empty path. */
export function formatIndexPath(path: IndexPath): string {
  return path.length === 0 ? 'root' : path.join('.');
}

export function parentPath(path: IndexPath): IndexPath {
  return path.slice(0, -1);
}

export function pathsEqual(a: IndexPath, b: IndexPath): boolean {
  return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

/** True when `path` equals `prefix` or lies below it. */
export function isPathPrefix(prefix: IndexPath, path: IndexPath): boolean {
  return prefix.length <= path.length && prefix.every((segment, i) => segment === path[i]);
}
