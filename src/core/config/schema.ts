import { z } from 'zod';

/**
 * Make an object field optional, applying the inner schema's defaults when missing.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Folder and file deny-lists applied by the tree scanner. */
export const ScanSettingsSchema = z.object({
  /** Extensions (with leading dot, compared case-insensitively) of files that become nodes */
  extensions: z.array(z.string()).default(['.yml', '.yaml']),
  /** Folder names never descended into */
  skip_folders: z.array(z.string()).default([
    'adhoc',
    'roles', // roles are graphed by the role cluster pass
    'upgrades',
    'files',
    'library',
    'templates',
    'filter_plugins',
    'lookup_plugins',
    'v3_3',
    'v3_4',
    'v3_5',
  ]),
  /** Folder names graphed with the unsupported style */
  unsupported: z.array(z.string()).default(['aws', 'gce', 'libvirt', 'openstack']),
  /** Treat unsupported folders as skipped instead of tagging them */
  skip_unsupported: z.boolean().default(false),
  /** Variable files that sit next to playbooks */
  skip_files: z.array(z.string()).default(['cluster_hosts.yml', 'vars.yml', 'vars.defaults.yml']),
});

/** Repository layout, relative to the repository root. */
export const LayoutSettingsSchema = z.object({
  playbooks_dir: z.string().default('playbooks'),
  roles_dir: z.string().default('roles'),
});

/** Walker behaviour. */
export const WalkSettingsSchema = z.object({
  display_roles: z.boolean().default(true),
  display_role_dependencies: z.boolean().default(false),
  /** Keys whose value names another playbook or task file */
  include_keys: z
    .array(z.string())
    .default(['include', 'import_playbook', 'include_tasks', 'import_tasks']),
  /** Task keys that invoke a role */
  include_role_keys: z.array(z.string()).default(['include_role', 'import_role']),
});

export const OutputFormatSchema = z.enum(['dot', 'mermaid', 'json']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('dot'),
});

/** Root configuration schema. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  scan: withDefaults(ScanSettingsSchema),
  layout: withDefaults(LayoutSettingsSchema),
  walk: withDefaults(WalkSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
});

// Type exports (inferred from schemas)
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type LayoutSettings = z.infer<typeof LayoutSettingsSchema>;
export type WalkSettings = z.infer<typeof WalkSettingsSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
