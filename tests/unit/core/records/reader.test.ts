import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { readRecords, RecordReader } from '../../../../src/core/records/reader.js';
import { Diagnostics } from '../../../../src/core/records/diagnostics.js';
import { EmptyFileError, ErrorCodes, ParseError } from '../../../../src/utils/errors.js';
import { logger } from '../../../../src/utils/logger.js';
import { createTempRepo, removeTempRepo } from '../../../helpers/temp-repo.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('readRecords', () => {
  let root: string;

  beforeEach(() => {
    root = createTempRepo({
      'site.yml': '- hosts: all\n  tasks: []\n- include: common.yml\n',
      'mixed.yml': '- name: first\n- just a string\n- 42\n- name: second\n',
      'empty.yml': '',
      'comments.yml': '# nothing here\n',
      'empty-list.yml': '[]\n',
      'scalars.yml': '- one\n- two\n',
      'mapping.yml': 'dependencies: []\n',
      'broken.yml': '- name: ok\n  tasks: [unclosed\n',
    });
  });

  afterEach(() => {
    removeTempRepo(root);
  });

  it('returns the records of a playbook in order', () => {
    expect(readRecords(join(root, 'site.yml'))).toEqual([
      { hosts: 'all', tasks: [] },
      { include: 'common.yml' },
    ]);
  });

  it('drops list items that are not mappings', () => {
    expect(readRecords(join(root, 'mixed.yml'))).toEqual([{ name: 'first' }, { name: 'second' }]);
  });

  it.each(['empty.yml', 'comments.yml', 'empty-list.yml', 'scalars.yml'])(
    'throws EmptyFileError for %s',
    (file) => {
      expect(() => readRecords(join(root, file))).toThrow(EmptyFileError);
    }
  );

  it('throws ParseError when the top level is not a list', () => {
    const error = thrownBy(() => readRecords(join(root, 'mapping.yml')));

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ code: ErrorCodes.NOT_A_RECORD_LIST });
  });

  it('throws ParseError for malformed YAML', () => {
    const error = thrownBy(() => readRecords(join(root, 'broken.yml')));

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ code: ErrorCodes.PARSE_ERROR });
    expect(String(error)).toContain('broken.yml');
  });

  it('throws ParseError with READ_ERROR for a missing file', () => {
    const error = thrownBy(() => readRecords(join(root, 'nope.yml')));

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ code: ErrorCodes.READ_ERROR });
  });
});

describe('RecordReader', () => {
  let root: string;
  let diagnostics: Diagnostics;
  let reader: RecordReader;

  beforeEach(() => {
    logger.setLevel('silent');
    root = createTempRepo({
      'playbooks/site.yml': '- hosts: all\n',
      'playbooks/vars.yml': '- include: should-not-be-read.yml\n',
      'playbooks/broken.yml': 'key: [unclosed\n',
      'playbooks/empty.yml': '',
      'roles/web/meta/main.yml': 'dependencies:\n  - common\n  - role: db\n    port: 5432\n  - {}\n',
      'roles/db/meta/main.yml': 'galaxy_info:\n  author: someone\n',
      'roles/cache/meta/main.yml': 'dependencies:\n',
      'roles/bad/meta/main.yml': 'dependencies: [\n',
    });
    diagnostics = new Diagnostics();
    reader = new RecordReader(root, new Set(['vars.yml']), diagnostics);
  });

  afterEach(() => {
    removeTempRepo(root);
    logger.setLevel('info');
  });

  it('reads records of an ordinary file', () => {
    expect(reader.read(join(root, 'playbooks/site.yml'))).toEqual([{ hosts: 'all' }]);
    expect(diagnostics.count()).toBe(0);
  });

  it('skips deny-listed file names without reading them', () => {
    expect(reader.isSkipped(join(root, 'playbooks/vars.yml'))).toBe(true);
    expect(reader.read(join(root, 'playbooks/vars.yml'))).toEqual([]);
    expect(diagnostics.count()).toBe(0);
  });

  it('reports a malformed file and returns no records', () => {
    expect(reader.read(join(root, 'playbooks/broken.yml'))).toEqual([]);

    const [entry] = diagnostics.list();
    expect(diagnostics.count()).toBe(1);
    expect(entry?.file).toBe('playbooks/broken.yml');
    expect(entry?.code).toBe(ErrorCodes.PARSE_ERROR);
    expect(entry?.severity).toBe('error');
  });

  it('records an empty file at info severity', () => {
    expect(reader.read(join(root, 'playbooks/empty.yml'))).toEqual([]);

    expect(diagnostics.count('info')).toBe(1);
    expect(diagnostics.forFile('playbooks/empty.yml')[0]?.code).toBe(ErrorCodes.EMPTY_FILE);
  });

  it('reports an unreadable file as a read error', () => {
    expect(reader.read(join(root, 'playbooks/missing.yml'))).toEqual([]);

    expect(diagnostics.list()[0]?.code).toBe(ErrorCodes.READ_ERROR);
  });

  describe('readDependencies', () => {
    it('parses bare and detailed dependencies', () => {
      const deps = reader.readDependencies(join(root, 'roles/web/meta/main.yml'));

      expect(deps).toEqual([
        { kind: 'name', name: 'common' },
        { kind: 'detailed', name: 'db', params: { port: 5432 } },
      ]);
    });

    it('reports entries that name no role', () => {
      reader.readDependencies(join(root, 'roles/web/meta/main.yml'));

      const [entry] = diagnostics.list();
      expect(entry?.code).toBe(ErrorCodes.INVALID_ROLE_REF);
      expect(entry?.message).toBe('Role entry names no role: {}');
      expect(entry?.file).toBe('roles/web/meta/main.yml');
    });

    it('treats a missing or empty dependencies key as no dependencies', () => {
      expect(reader.readDependencies(join(root, 'roles/db/meta/main.yml'))).toEqual([]);
      expect(reader.readDependencies(join(root, 'roles/cache/meta/main.yml'))).toEqual([]);
      expect(diagnostics.count()).toBe(0);
    });

    it('reports a malformed meta file and returns no dependencies', () => {
      expect(reader.readDependencies(join(root, 'roles/bad/meta/main.yml'))).toEqual([]);
      expect(diagnostics.list()[0]?.code).toBe(ErrorCodes.PARSE_ERROR);
    });
  });
});
