import { isRecord, type IncludeDirective, type IncludeTarget, type PlaybookRecord } from './types.js';

const TEMPLATE_MARKERS = ['{{', '{%'];

/**
 * Classify the value of an include directive.
 *
 * Only the first whitespace-separated token names the file; the rest are inline
 * variables (`include: common.yml tag=setup`). The mapping form
 * `include_tasks: { file: setup.yml }` is accepted as well.
 */
export function parseIncludeTarget(value: unknown): IncludeTarget {
  const raw = isRecord(value) ? value['file'] : value;
  if (typeof raw !== 'string' || raw.trim() === '') {
    return { kind: 'invalid', raw: value };
  }

  const trimmed = raw.trim();
  const [fileToken = trimmed] = trimmed.split(/\s+/);
  if (TEMPLATE_MARKERS.some((marker) => fileToken.includes(marker))) {
    return { kind: 'template', raw: trimmed };
  }
  return { kind: 'path', path: fileToken };
}

/**
 * Find the first include keyword present in a record.
 */
export function findInclude(record: PlaybookRecord, keywords: readonly string[]): IncludeDirective | null {
  for (const keyword of keywords) {
    if (keyword in record) {
      return { keyword, target: parseIncludeTarget(record[keyword]) };
    }
  }
  return null;
}

/**
 * Text shown on an include marker node.
 */
export function describeIncludeTarget(target: IncludeTarget): string {
  switch (target.kind) {
    case 'path':
      return target.path;
    case 'template':
      return target.raw;
    case 'invalid':
      return '(invalid)';
  }
}
