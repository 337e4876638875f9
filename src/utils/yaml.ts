/**
 * YAML parsing with zod validation.
 */
import { parse, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';

/**
 * Parse YAML content. `source` names the document in error messages.
 */
export function parseYaml(content: string, source = '<input>'): unknown {
  try {
    return parse(content);
  } catch (error) {
    const position = error instanceof YAMLParseError ? error.linePos?.[0] : undefined;
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML in ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { source, line: position?.line, column: position?.col }
    );
  }
}

/**
 * Parse YAML content and validate it against a zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T,
  source = '<input>'
): z.infer<T> {
  const result = schema.safeParse(parseYaml(content, source));
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Invalid ${source}: ${formatZodError(result.error)}`,
      { source, issues: result.error.issues }
    );
  }
  return result.data;
}

/**
 * One `path: message` entry per issue, `(root)` for the document itself.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
