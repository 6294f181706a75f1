/** Parsed arbor:// URI */
export type ParsedResourceUri =
  | { kind: 'guide' }
  | { kind: 'plan'; planId: number };
