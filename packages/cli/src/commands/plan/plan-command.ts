import { formatIndexPath, parsePlanId } from '@arbor/core';
import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command.js';
import type { BaseCommandOptions } from '../../interfaces/command.js';
import { renderPlan } from '../../render/render.js';
import { registerPlanCommands } from './plan.js';

export interface PlanCreateOptions extends BaseCommandOptions {
  notes?: string;
}

export interface PlanNotesOptions extends BaseCommandOptions {
  clear?: boolean;
}

/**
 * PlanCommand - plan lifecycle over the api-server.
 */
export class PlanCommand extends BaseCommand {
  register(program: Command): void {
    registerPlanCommands(program, this);
  }

  async executeCreate(goal: string, options: PlanCreateOptions): Promise<void> {
    await this.run(options, async () => {
      const id = await this.client(options).createPlan(goal, options.notes ?? null);
      this.handleSuccess({ id, goal }, options, `Plan ${id} created: ${goal}`, [
        '',
        `Select it with: export ARBOR_PLAN_ID=${id}`,
      ]);
    });
  }

  async executeList(options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const plans = await this.client(options).listPlans();
      const lines = plans.length === 0
        ? ["No plans yet. Create one with 'arbor plan create <goal>'"]
        : plans.map((plan) => `  ${plan.id}  ${plan.goal}`);
      this.handleSuccess(plans, options, undefined, lines);
    });
  }

  async executeShow(id: string | undefined, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const planId = id === undefined ? this.planId(options) : parsePlanId(id);
      const plan = await this.client(options).getPlan(planId);
      this.handleSuccess(plan, options, undefined, renderPlan(plan));
    });
  }

  async executeDelete(id: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const planId = parsePlanId(id);
      await this.client(options).deletePlan(planId);
      this.handleSuccess({ id: planId, deleted: true }, options, `Plan ${planId} deleted`);
    });
  }

  async executeNotes(text: string | undefined, options: PlanNotesOptions): Promise<void> {
    await this.run(options, async () => {
      const planId = this.planId(options);
      const client = this.client(options);

      if (options.clear) {
        await client.updatePlanNotes(planId, null);
        this.handleSuccess({ id: planId, notes: null }, options, `Notes cleared for plan ${planId}`);
        return;
      }
      if (text === undefined) {
        const plan = await client.getPlan(planId);
        this.handleSuccess(
          { id: planId, notes: plan.notes },
          options,
          undefined,
          [plan.notes ?? `Plan ${planId} has no notes (current: ${formatIndexPath(plan.current)})`],
        );
        return;
      }
      await client.updatePlanNotes(planId, text);
      this.handleSuccess({ id: planId, notes: text }, options, `Notes updated for plan ${planId}`);
    });
  }
}
