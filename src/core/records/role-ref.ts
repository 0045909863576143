import { isRecord, type RoleRef } from './types.js';

const ROLE_NAME_KEYS = ['role', 'name'] as const;

/**
 * Resolve a `roles:` or `dependencies:` entry into its canonical form.
 *
 * @returns null when the entry names no role
 */
export function parseRoleRef(entry: unknown): RoleRef | null {
  if (typeof entry === 'string') {
    const name = entry.trim();
    return name ? { kind: 'name', name } : null;
  }

  if (!isRecord(entry)) {
    return null;
  }

  for (const key of ROLE_NAME_KEYS) {
    const value = entry[key];
    if (typeof value === 'string' && value.trim()) {
      const params: Record<string, unknown> = {};
      for (const [paramKey, paramValue] of Object.entries(entry)) {
        if (paramKey !== key) {
          params[paramKey] = paramValue;
        }
      }
      return { kind: 'detailed', name: value.trim(), params };
    }
  }

  return null;
}

/**
 * Parse a list of role entries, handing unusable ones to `onInvalid`.
 * A value that is not a list yields no roles.
 */
export function parseRoleRefs(entries: unknown, onInvalid?: (entry: unknown) => void): RoleRef[] {
  if (!Array.isArray(entries)) {
    return [];
  }

  const refs: RoleRef[] = [];
  for (const entry of entries) {
    const ref = parseRoleRef(entry);
    if (ref) {
      refs.push(ref);
    } else {
      onInvalid?.(entry);
    }
  }
  return refs;
}
