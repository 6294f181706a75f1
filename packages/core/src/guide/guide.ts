import { getAllLevels } from '../levels/index.js';
import { PLAN_ID_ENV } from '../config_manager/index.js';

export type GuideMode = 'cli' | 'mcp';

interface GuideFlavour {
  title: string;
  plans: string;
  workflow: string;
  reference: string;
}

const FLAVOURS: Record<GuideMode, GuideFlavour> = {
  cli: {
    title: 'ARBOR GUIDE',
    plans: `== PLANS ==

Every command works on one plan. Create one, then select it:

  $ arbor plan create "Build the billing service" --notes "Stripe, EU only"
  $ export ${PLAN_ID_ENV}=1          # default for this shell
  $ arbor --plan 2 current          # one-off override
  $ arbor plan list`,
    workflow: `== WORKFLOW ==

  $ arbor task add --level planning "Design the architecture"
  $ arbor move 0
  $ arbor task add --level isolation "Split billing from invoicing"
  $ arbor distilled                  # focused view of where you are
  $ arbor task lease 0.0             # check out the task
  $ arbor task complete --index 0.0 --lease 7 --summary "Split done"

New tasks are added under the current task unless --parent is given.`,
    reference: `== COMMANDS ==

  plan create <goal> [--notes]        plan list | plan show | plan delete <id>
  plan notes <text> | --clear
  task add <description> [--level] [--notes] [--parent <path>]
  task complete [--index <path>] [--lease <n>] [--force] [--summary <text>]
  task uncomplete <path>              task remove <path>
  task change-level <path> <level>    task lease [path]
  task notes view|set|delete <path> [text]
  move <path> | current | distilled | guide
  serve [--port] [--example]          mcp [--example] [--expose <port>]

Global: --server <url>, --plan <id>, --json`,
  },
  mcp: {
    title: 'ARBOR MCP GUIDE',
    plans: `== PLANS ==

Every tool takes an optional plan_id; without it the server uses ${PLAN_ID_ENV}.

  arbor_plan_create(goal, notes?)    -> { id }
  arbor_plan_list()                  arbor_plan_get(plan_id)    arbor_plan_delete(plan_id)`,
    workflow: `== WORKFLOW ==

  arbor_task_add(plan_id, description="Design the architecture", level="planning")
  arbor_move_to(plan_id, path="0")
  arbor_task_add(plan_id, description="Split billing from invoicing", level="isolation")
  arbor_get_distilled_context(plan_id)
  arbor_lease_generate(plan_id, path="0,0")            -> { lease: 7, suggestions }
  arbor_task_complete(plan_id, path="0,0", lease=7, summary="Split done")

arbor_task_add appends under the current task unless parent is given.`,
    reference: `== TOOLS ==

  Plans:       arbor_plan_create, arbor_plan_get, arbor_plan_list, arbor_plan_delete
  Tasks:       arbor_task_add, arbor_task_complete, arbor_task_uncomplete,
               arbor_task_remove, arbor_task_change_level
  Navigation:  arbor_move_to, arbor_get_current, arbor_get_distilled_context
  Notes:       arbor_notes_get, arbor_notes_set, arbor_notes_delete
  Leases:      arbor_lease_generate
  Help:        arbor_guide`,
  },
};

function levelsSection(): string {
  const lines = getAllLevels().map(
    (level) =>
      `${level.ordinal} ${level.title}: ${level.description}\n   ${level.focus}\n   Ask: ${level.questions.join(' ')}`,
  );
  return `== LEVELS ==\n\nLevels label how abstract a task is. They are advisory: a child may use any level.\n\n${lines.join('\n\n')}`;
}

const PATHS_SECTION = `== INDEX PATHS ==

A task is addressed by its position: "0" is the first top-level task, "0,1" (or "0.1")
its second child. Removing a task shifts the indices of its later siblings, so
re-read the plan after structural changes.`;

const LEASES_SECTION = `== COMPLETING TASKS ==

Completion is a two-step check-out:
  1. Generate a lease for the task. A newer lease replaces any older one.
  2. Complete the task with that lease. The lease is consumed.
Completing without a lease fails with LEASE_REQUIRED, with a stale lease with
LEASE_INVALID, and a second completion with ALREADY_COMPLETED. Force skips the
lease check; use it sparingly. Completing a task completes its subtasks, and
adding a subtask reopens its completed ancestors.`;

/**
 * Usage guide shown by `arbor guide`, `GET /api/guide` and the
 * `arbor_guide` tool.
 */
export function getGuide(mode: GuideMode = 'cli'): string {
  const flavour = FLAVOURS[mode];
  return [
    `=== ${flavour.title} ===`,
    'Arbor breaks a goal into a tree of tasks across four levels of abstraction, keeps a\nfocus on the current task, and coordinates completion between independent callers.',
    flavour.plans,
    levelsSection(),
    PATHS_SECTION,
    flavour.workflow,
    LEASES_SECTION,
    flavour.reference,
  ].join('\n\n');
}
