import * as path from 'node:path';
import { EmptyFileError, ErrorCodes, ParseError, isErrorCode } from '../../utils/errors.js';
import { toRepoPath } from '../../utils/file-system.js';
import { loadYamlSync } from '../../utils/yaml.js';
import type { Diagnostics } from './diagnostics.js';
import { parseRoleRefs } from './role-ref.js';
import { isRecord, type PlaybookRecord, type RoleRef } from './types.js';

/**
 * Parse a playbook or task file into its list of records.
 * Items of the top-level list that are not mappings are dropped.
 *
 * @throws ParseError when the file cannot be read or is not a YAML list
 * @throws EmptyFileError when the file holds no records
 */
export function readRecords(filePath: string): PlaybookRecord[] {
  const parsed = loadYamlSync(filePath);

  if (parsed === null || parsed === undefined) {
    throw new EmptyFileError(filePath);
  }
  if (!Array.isArray(parsed)) {
    throw new ParseError(
      ErrorCodes.NOT_A_RECORD_LIST,
      `Expected a list of plays or tasks, found ${typeof parsed}: ${filePath}`,
      { filePath }
    );
  }

  const records = parsed.filter(isRecord);
  if (records.length === 0) {
    throw new EmptyFileError(filePath);
  }
  return records;
}

/**
 * Reads files for the walkers, applying the file deny-list and turning
 * per-file failures into diagnostics.
 */
export class RecordReader {
  constructor(
    private readonly repoRoot: string,
    private readonly skipFiles: ReadonlySet<string>,
    private readonly diagnostics: Diagnostics
  ) {}

  /**
   * Whether the file's base name is on the deny-list.
   */
  isSkipped(filePath: string): boolean {
    return this.skipFiles.has(path.basename(filePath));
  }

  /**
   * Records of a file, or an empty list when it is skipped, empty or unparseable.
   */
  read(filePath: string): PlaybookRecord[] {
    if (this.isSkipped(filePath)) {
      return [];
    }

    try {
      return readRecords(filePath);
    } catch (error) {
      if (error instanceof EmptyFileError) {
        this.diagnostics.report({
          file: this.relative(filePath),
          code: ErrorCodes.EMPTY_FILE,
          message: 'File contains no records',
          severity: 'info',
        });
        return [];
      }
      if (error instanceof ParseError) {
        this.diagnostics.report({
          file: this.relative(filePath),
          code: isErrorCode(error.code) ? error.code : ErrorCodes.PARSE_ERROR,
          message: error.message,
          severity: 'error',
        });
        return [];
      }
      throw error;
    }
  }

  /**
   * Dependencies declared in a role's `meta/main.yml`.
   * A meta file without a `dependencies` key declares none.
   */
  readDependencies(metaPath: string): RoleRef[] {
    let parsed: unknown;
    try {
      parsed = loadYamlSync(metaPath);
    } catch (error) {
      if (error instanceof ParseError) {
        this.diagnostics.report({
          file: this.relative(metaPath),
          code: isErrorCode(error.code) ? error.code : ErrorCodes.PARSE_ERROR,
          message: error.message,
          severity: 'error',
        });
        return [];
      }
      throw error;
    }

    if (!isRecord(parsed)) {
      return [];
    }
    return parseRoleRefs(parsed['dependencies'], (entry) => this.reportInvalidRole(metaPath, entry));
  }

  /**
   * Report a `roles:` or `dependencies:` entry that names no role.
   */
  reportInvalidRole(filePath: string, entry: unknown): void {
    this.diagnostics.report({
      file: this.relative(filePath),
      code: ErrorCodes.INVALID_ROLE_REF,
      message: `Role entry names no role: ${JSON.stringify(entry)}`,
      severity: 'warning',
    });
  }

  /**
   * Repo-relative form of a path, as used in diagnostics and node keys.
   */
  relative(filePath: string): string {
    return toRepoPath(this.repoRoot, filePath);
  }
}
