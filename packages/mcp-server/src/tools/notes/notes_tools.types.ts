import type { PathArgument, PlanIdArgument } from '../helpers.js';

export interface NotesPathInput {
  plan_id?: PlanIdArgument;
  path: PathArgument;
}

export interface NotesSetInput extends NotesPathInput {
  notes: string;
}
