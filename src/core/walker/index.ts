export { PlaybookWalker } from './playbook-walker.js';
export type { PlaybookWalkerOptions, WalkOptions } from './playbook-walker.js';
export { RoleExpander } from './role-expander.js';
export type { RoleExpanderOptions } from './role-expander.js';
