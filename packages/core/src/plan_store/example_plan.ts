import type { IndexPath } from '../index_path/index.js';
import type { Level } from '../levels/index.js';
import type { PlanId } from '../plan_tree/index.js';
import type { PlanStore } from './plan_store.js';

interface ExampleTask {
  description: string;
  level: Level;
  notes?: string;
  completedWith?: string;
  children?: ExampleTask[];
}

export const EXAMPLE_GOAL = 'Build a web application';

const EXAMPLE_TREE: ExampleTask[] = [
  {
    description: 'Design the architecture',
    level: 'planning',
    completedWith: 'Monolith with a REST API and a single-page client.',
    children: [{ description: 'Choose the stack', level: 'isolation', completedWith: 'Node, Postgres, React.' }],
  },
  {
    description: 'Implement the backend',
    level: 'isolation',
    children: [
      {
        description: 'Set up the database',
        level: 'ordering',
        children: [
          { description: 'Define the product model', level: 'implementation', completedWith: 'Products table migrated.' },
          { description: 'Add relationships', level: 'implementation' },
        ],
      },
      {
        description: 'Create API endpoints',
        level: 'ordering',
        notes: 'CRUD first, search later.',
        children: [
          { description: 'Implement authentication', level: 'implementation' },
          { description: 'Implement product CRUD', level: 'implementation' },
        ],
      },
    ],
  },
  {
    description: 'Implement the frontend',
    level: 'isolation',
    children: [
      { description: 'Design UI components', level: 'ordering', completedWith: 'Component library agreed.' },
      { description: 'Set up state management', level: 'ordering' },
    ],
  },
  { description: 'Deploy to production', level: 'ordering', notes: 'Staging sign-off required.' },
];

/** Focus of the seeded plan: "Create API endpoints". */
export const EXAMPLE_CURRENT: IndexPath = [1, 1];

/**
 * Seeds a representative plan, used by `serve --example` and
 * `mcp --example`.
 */
export async function seedExamplePlan(store: PlanStore): Promise<PlanId> {
  const planId = await store.createPlan(EXAMPLE_GOAL, 'Example plan seeded at startup.');

  const seed = async (tasks: ExampleTask[], parent: IndexPath): Promise<void> => {
    for (const task of tasks) {
      const { path } = await store.addTask(planId, parent, {
        description: task.description,
        level: task.level,
        notes: task.notes ?? null,
      });
      await seed(task.children ?? [], path);
      if (task.completedWith) {
        await store.completeTask(planId, path, { force: true, summary: task.completedWith });
      }
    }
  };

  await seed(EXAMPLE_TREE, []);
  await store.moveTo(planId, EXAMPLE_CURRENT);
  return planId;
}
