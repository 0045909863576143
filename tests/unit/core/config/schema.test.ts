/**
 * Tests for config schema Zod validation.
 */
import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  OutputFormatSchema,
  ScanSettingsSchema,
  WalkSettingsSchema,
} from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should fill every section from an empty object', () => {
    const config = ConfigSchema.parse({});

    expect(config.version).toBe('1.0');
    expect(config.layout).toEqual({ playbooks_dir: 'playbooks', roles_dir: 'roles' });
    expect(config.output.format).toBe('dot');
    expect(config.scan.skip_unsupported).toBe(false);
  });

  it('should treat a null section as missing', () => {
    const config = ConfigSchema.parse({ scan: null, walk: null });

    expect(config.scan.extensions).toEqual(['.yml', '.yaml']);
    expect(config.walk.display_roles).toBe(true);
  });

  it('should keep defaults for fields a section leaves out', () => {
    const config = ConfigSchema.parse({ layout: { playbooks_dir: 'plays' } });

    expect(config.layout).toEqual({ playbooks_dir: 'plays', roles_dir: 'roles' });
  });

  it('should reject wrong types', () => {
    expect(ConfigSchema.safeParse({ walk: { display_roles: 'yes' } }).success).toBe(false);
  });
});

describe('ScanSettingsSchema', () => {
  it('should skip the roles folder and variable files by default', () => {
    const scan = ScanSettingsSchema.parse({});

    expect(scan.skip_folders).toContain('roles');
    expect(scan.skip_files).toEqual(['cluster_hosts.yml', 'vars.yml', 'vars.defaults.yml']);
    expect(scan.unsupported).toEqual(['aws', 'gce', 'libvirt', 'openstack']);
  });
});

describe('WalkSettingsSchema', () => {
  it('should list include and role include keywords', () => {
    const walk = WalkSettingsSchema.parse({});

    expect(walk.include_keys).toEqual(['include', 'import_playbook', 'include_tasks', 'import_tasks']);
    expect(walk.include_role_keys).toEqual(['include_role', 'import_role']);
    expect(walk.display_role_dependencies).toBe(false);
  });
});

describe('OutputFormatSchema', () => {
  it('should accept the supported formats only', () => {
    expect(OutputFormatSchema.options).toEqual(['dot', 'mermaid', 'json']);
    expect(OutputFormatSchema.safeParse('svg').success).toBe(false);
  });
});
