import { InvalidOperationError } from '../errors/index.js';

/**
 * Abstraction levels a task can be labelled with, ordered from the most
 * abstract to the most concrete. The label is advisory: a child may carry
 * any level regardless of its parent's.
 */
export const LEVELS = ['planning', 'isolation', 'ordering', 'implementation'] as const;

export type Level = (typeof LEVELS)[number];

export interface LevelInfo {
  name: Level;
  title: string;
  ordinal: number;
  description: string;
  focus: string;
  questions: string[];
}

const LEVEL_GUIDANCE: Record<Level, Omit<LevelInfo, 'name' | 'ordinal'>> = {
  planning: {
    title: 'Planning',
    description: 'High-level goals and strategy',
    focus: 'Break the goal into major components and decide on the overall approach.',
    questions: [
      'What is the ultimate goal?',
      'What are the major components needed?',
      'What constraints exist?',
    ],
  },
  isolation: {
    title: 'Isolation',
    description: 'Isolating the problem space and its boundaries',
    focus: 'Separate each component, define its boundaries and the interfaces between them.',
    questions: [
      'What are the boundaries of this component?',
      'What interfaces are needed?',
      'What are the dependencies?',
    ],
  },
  ordering: {
    title: 'Ordering',
    description: 'Sequencing the work and its dependencies',
    focus: 'Decide what runs first, what can run in parallel and what blocks what.',
    questions: [
      'What is the optimal order of implementation?',
      'What can be done in parallel?',
      'What are the critical path items?',
    ],
  },
  implementation: {
    title: 'Implementation',
    description: 'Concrete implementation steps',
    focus: 'Make the specific change, test it and handle its edge cases.',
    questions: [
      'What specific changes are needed?',
      'How should this be tested?',
      'What edge cases exist?',
    ],
  },
};

export function isLevel(value: unknown): value is Level {
  return typeof value === 'string' && LEVELS.some((level) => level === value);
}

export function levelOrdinal(level: Level): number {
  return LEVELS.indexOf(level);
}

export function compareLevels(a: Level, b: Level): number {
  return levelOrdinal(a) - levelOrdinal(b);
}

/**
 * Accepts a level name in any case ("Planning", "ordering") or its ordinal
 * (0..3, as a number or a numeric string).
 */
export function parseLevel(input: unknown): Level {
  if (typeof input === 'number' || (typeof input === 'string' && /^\d+$/.test(input.trim()))) {
    const ordinal = Number(input);
    const level = LEVELS[ordinal];
    if (Number.isInteger(ordinal) && level !== undefined) {
      return level;
    }
  } else if (typeof input === 'string') {
    const normalized = input.trim().toLowerCase();
    if (isLevel(normalized)) {
      return normalized;
    }
  }
  throw new InvalidOperationError(
    `Invalid level ${JSON.stringify(input)}. Expected one of ${LEVELS.join(', ')} or 0-${LEVELS.length - 1}`,
  );
}

export function getLevelInfo(level: Level): LevelInfo {
  const guidance = LEVEL_GUIDANCE[level];
  return {
    name: level,
    ordinal: levelOrdinal(level),
    title: guidance.title,
    description: guidance.description,
    focus: guidance.focus,
    questions: [...guidance.questions],
  };
}

export function getAllLevels(): LevelInfo[] {
  return LEVELS.map(getLevelInfo);
}
