/**
 * YAML parsing utilities.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError, ParseError, ErrorCodes } from './errors.js';
import { readFileSync } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    // Unknown tags such as !vault resolve to plain strings without a console warning
    return parse(content, { logLevel: 'error' });
  } catch (error) {
    throw new ParseError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Load and parse a YAML file.
 * Read failures surface as ParseError with READ_ERROR so callers handle both alike.
 */
export function loadYamlSync(filePath: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath);
  } catch (error) {
    throw new ParseError(
      ErrorCodes.READ_ERROR,
      `Failed to read file: ${filePath}`,
      { filePath, error: error instanceof Error ? error.message : String(error) }
    );
  }

  try {
    return parseYaml(content);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ParseError(error.code, `${error.message} (file: ${filePath})`, {
        ...error.details,
        filePath,
      });
    }
    throw error;
  }
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): z.infer<T> {
  const parsed = loadYamlSync(filePath);
  const result = schema.safeParse(parsed ?? {});

  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `YAML validation failed: ${formatZodError(result.error)} (file: ${filePath})`,
      { filePath, errors: result.error.issues }
    );
  }

  return result.data;
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}
