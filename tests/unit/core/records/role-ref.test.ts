import { describe, it, expect, vi } from 'vitest';
import { parseRoleRef, parseRoleRefs } from '../../../../src/core/records/role-ref.js';

describe('parseRoleRef', () => {
  it('reads a bare role name', () => {
    expect(parseRoleRef('openshift_node')).toEqual({ kind: 'name', name: 'openshift_node' });
  });

  it('trims whitespace around a bare name', () => {
    expect(parseRoleRef('  common ')).toEqual({ kind: 'name', name: 'common' });
  });

  it('reads a mapping with a role key and keeps the other keys as params', () => {
    expect(parseRoleRef({ role: 'etcd', when: 'etcd_enabled', tags: ['etcd'] })).toEqual({
      kind: 'detailed',
      name: 'etcd',
      params: { when: 'etcd_enabled', tags: ['etcd'] },
    });
  });

  it('accepts a name key, as used by include_role', () => {
    expect(parseRoleRef({ name: 'docker', tasks_from: 'setup.yml' })).toEqual({
      kind: 'detailed',
      name: 'docker',
      params: { tasks_from: 'setup.yml' },
    });
  });

  it('prefers role over name when both are present', () => {
    expect(parseRoleRef({ role: 'etcd', name: 'Install etcd' })).toEqual({
      kind: 'detailed',
      name: 'etcd',
      params: { name: 'Install etcd' },
    });
  });

  it.each([[''], ['   '], [42], [null], [['common']], [{ when: 'x' }], [{ role: 7 }]])(
    'returns null for %j',
    (entry) => {
      expect(parseRoleRef(entry)).toBeNull();
    }
  );
});

describe('parseRoleRefs', () => {
  it('parses every usable entry and reports the rest', () => {
    const onInvalid = vi.fn();

    const refs = parseRoleRefs(['common', { role: 'web' }, 3], onInvalid);

    expect(refs.map((ref) => ref.name)).toEqual(['common', 'web']);
    expect(onInvalid).toHaveBeenCalledTimes(1);
    expect(onInvalid).toHaveBeenCalledWith(3);
  });

  it('returns no roles for a value that is not a list', () => {
    expect(parseRoleRefs(null)).toEqual([]);
    expect(parseRoleRefs('common')).toEqual([]);
  });
});
