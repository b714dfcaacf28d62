/**
 * Extraction option resolution: environment defaults, per-session defaults
 * and per-call overrides, validated with zod.
 */
import { z } from 'zod';
import {
  ENV_HIGHLIGHT,
  ENV_VERBOSE,
  ENV_VIEWPORT_EXPANSION,
  PerceptionError,
  extractionOptionsSchema,
} from 'perception-shared';
import type { ExtractionOptions, ResolvedExtractionOptions } from 'perception-shared';

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const flagSchema = z.preprocess(
  emptyToUndefined,
  z
    .enum(['1', '0', 'true', 'false', 'yes', 'no'])
    .transform((value) => value === '1' || value === 'true' || value === 'yes')
    .optional()
);

const envSchema = z.object({
  [ENV_VIEWPORT_EXPANSION]: z.preprocess(emptyToUndefined, z.coerce.number().int().optional()),
  [ENV_HIGHLIGHT]: flagSchema,
  [ENV_VERBOSE]: flagSchema,
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Read extraction defaults from environment variables */
export function configFromEnv(env: Record<string, string | undefined>): ExtractionOptions {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new PerceptionError('INVALID_OPTIONS', `Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const options: ExtractionOptions = {};
  const expansion = parsed.data[ENV_VIEWPORT_EXPANSION];
  const highlight = parsed.data[ENV_HIGHLIGHT];
  const verbose = parsed.data[ENV_VERBOSE];
  if (expansion !== undefined) options.viewportExpansion = expansion;
  if (highlight !== undefined) options.highlight = highlight;
  if (verbose !== undefined) options.verbose = verbose;
  return options;
}

/** Layer options; a defined value in `override` wins over `base` */
export function mergeOptions(base: ExtractionOptions, override: ExtractionOptions): ExtractionOptions {
  return {
    highlight: override.highlight ?? base.highlight,
    focusHighlightIndex: override.focusHighlightIndex ?? base.focusHighlightIndex,
    viewportExpansion: override.viewportExpansion ?? base.viewportExpansion,
    highlightFromIndex: override.highlightFromIndex ?? base.highlightFromIndex,
    verbose: override.verbose ?? base.verbose,
  };
}

/** Validate options and fill in defaults */
export function resolveOptions(options: ExtractionOptions = {}): ResolvedExtractionOptions {
  const parsed = extractionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new PerceptionError('INVALID_OPTIONS', `Invalid extraction options: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
