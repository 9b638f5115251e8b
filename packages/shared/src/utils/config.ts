import { tickscopeConfigSchema } from '../schemas/config.schema.js';
import type { ResolvedConfig } from '../schemas/config.schema.js';
import { ConfigValidationError } from './errors.js';
import { parseDuration } from './parser.js';

/**
 * Validate raw configuration (file contents merged with CLI flags) and fill
 * in every default.
 */
export function resolveConfig(input: unknown = {}): ResolvedConfig {
  const result = tickscopeConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }

  let interval: number;
  try {
    interval = parseDuration(result.data.interval);
  } catch (err) {
    throw new ConfigValidationError([`interval: ${err instanceof Error ? err.message : String(err)}`]);
  }
  if (interval <= 0) {
    throw new ConfigValidationError(['interval: must be positive']);
  }

  return { ...result.data, interval };
}
