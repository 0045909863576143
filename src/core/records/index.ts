export { readRecords, RecordReader } from './reader.js';
export { Diagnostics } from './diagnostics.js';
export type { Diagnostic, DiagnosticSeverity } from './diagnostics.js';
export { parseRoleRef, parseRoleRefs } from './role-ref.js';
export { parseIncludeTarget, findInclude, describeIncludeTarget } from './include-target.js';
export { isRecord } from './types.js';
export type { PlaybookRecord, RoleRef, IncludeTarget, IncludeDirective } from './types.js';
