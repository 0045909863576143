/**
 * One parsed statement of a playbook or task file: a play, a task, an include.
 */
export type PlaybookRecord = Record<string, unknown>;

/**
 * A role reference, either a bare name or a mapping with a `role` (or `name`) key
 * plus the variables passed to the role.
 */
export type RoleRef =
  | { kind: 'name'; name: string }
  | { kind: 'detailed'; name: string; params: Record<string, unknown> };

/**
 * Where an include directive points.
 * - path: a literal file path, resolved relative to the including file
 * - template: a runtime expression that cannot be resolved statically
 * - invalid: anything else (a number, an empty string, a mapping without `file`)
 */
export type IncludeTarget =
  | { kind: 'path'; path: string }
  | { kind: 'template'; raw: string }
  | { kind: 'invalid'; raw: unknown };

/**
 * An include directive found in a record.
 */
export interface IncludeDirective {
  /** The key that introduced it, e.g. `include` or `import_playbook` */
  keyword: string;
  target: IncludeTarget;
}

export function isRecord(value: unknown): value is PlaybookRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
