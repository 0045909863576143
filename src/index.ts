/**
 * playbook-grapher - diagram how the playbooks, task files and roles of an
 * Ansible repository reference one another.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Graph model and formatting
export * from './core/graph/index.js';

// File records
export * from './core/records/index.js';

// Walkers
export * from './core/scanner/index.js';
export * from './core/walker/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
