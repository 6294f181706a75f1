import { formatIndexPath, type IndexPath } from '@arbor/core';
import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command.js';
import type { BaseCommandOptions } from '../../interfaces/command.js';
import { renderLease } from '../../render/render.js';
import { parseInteger, parseLevelArgument, parsePathArgument } from '../../utils/parse.js';
import { registerTaskCommands } from './task.js';

export interface TaskAddOptions extends BaseCommandOptions {
  level?: string;
  notes?: string;
  parent?: string;
}

export interface TaskCompleteOptions extends BaseCommandOptions {
  index?: string;
  lease?: string;
  force?: boolean;
  summary?: string;
}

export type TaskNotesAction = 'view' | 'set' | 'delete';

const DEFAULT_LEVEL = 'planning';

/**
 * TaskCommand - structure, completion and notes of the tasks in a plan.
 */
export class TaskCommand extends BaseCommand {
  register(program: Command): void {
    registerTaskCommands(program, this);
  }

  async executeAdd(description: string, options: TaskAddOptions): Promise<void> {
    await this.run(options, async () => {
      const planId = this.planId(options);
      const result = await this.client(options).addTask(planId, {
        description,
        level: parseLevelArgument(options.level ?? DEFAULT_LEVEL),
        notes: options.notes ?? null,
        ...(options.parent !== undefined ? { parent: parsePathArgument(options.parent) } : {}),
      });
      this.handleSuccess(
        result,
        options,
        `Added task ${formatIndexPath(result.path)}: ${result.task.description} (${result.task.level})`,
      );
    });
  }

  async executeComplete(options: TaskCompleteOptions): Promise<void> {
    await this.run(options, async () => {
      const { path, task } = await this.client(options).completeTask(this.planId(options), optionalPath(options.index), {
        ...(options.lease !== undefined ? { lease: parseInteger(options.lease, '--lease') } : {}),
        ...(options.force ? { force: true } : {}),
        ...(options.summary !== undefined ? { summary: options.summary } : {}),
      });
      this.handleSuccess(
        { path, task },
        options,
        `Completed task ${formatIndexPath(path)}: ${task.description}`,
        task.summary ? [`  Summary: ${task.summary}`] : [],
      );
    });
  }

  async executeUncomplete(pathText: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const path = parsePathArgument(pathText);
      await this.client(options).uncompleteTask(this.planId(options), path);
      this.handleSuccess({ path, completed: false }, options, `Task ${formatIndexPath(path)} reopened`);
    });
  }

  async executeRemove(pathText: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const path = parsePathArgument(pathText);
      const removed = await this.client(options).removeTask(this.planId(options), path);
      this.handleSuccess(
        { path, removed },
        options,
        `Removed task ${formatIndexPath(path)}: ${removed.description}`,
        ['Later siblings shifted up by one; re-read the plan before using their indices.'],
      );
    });
  }

  async executeChangeLevel(pathText: string, levelText: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const path = parsePathArgument(pathText);
      const level = parseLevelArgument(levelText);
      await this.client(options).changeLevel(this.planId(options), path, level);
      this.handleSuccess({ path, level }, options, `Task ${formatIndexPath(path)} is now ${level}`);
    });
  }

  async executeLease(pathText: string | undefined, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const grant = await this.client(options).generateLease(this.planId(options), optionalPath(pathText));
      this.handleSuccess(grant, options, undefined, renderLease(grant));
    });
  }

  async executeNotes(action: string, pathText: string, text: string | undefined, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const planId = this.planId(options);
      const client = this.client(options);
      const path = parsePathArgument(pathText);
      const index = formatIndexPath(path);

      switch (action) {
        case 'view': {
          const notes = await client.getNotes(planId, path);
          this.handleSuccess({ path, notes }, options, undefined, [notes ?? `Task ${index} has no notes`]);
          return;
        }
        case 'set': {
          if (text === undefined) {
            this.handleError('task notes set requires the note text', options);
            return;
          }
          await client.setNotes(planId, path, text);
          this.handleSuccess({ path, notes: text }, options, `Notes updated for task ${index}`);
          return;
        }
        case 'delete': {
          await client.deleteNotes(planId, path);
          this.handleSuccess({ path, notes: null }, options, `Notes deleted for task ${index}`);
          return;
        }
        default:
          this.handleError(`Unknown notes action "${action}"; use view, set or delete`, options);
      }
    });
  }
}

/** An omitted path lets the server resolve its current focus. */
function optionalPath(text: string | undefined): IndexPath | null {
  return text === undefined ? null : parsePathArgument(text);
}
