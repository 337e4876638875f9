/**
 * Configuration schema for `.argcheck.yaml`.
 */
import { z } from 'zod';
import { RULE_IDS } from '../diagnostics/types.js';
import { DEFAULT_ARGUMENT_MODULES } from '../schema/reader.js';

/**
 * Helper to create an optional object field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Severity a rule is reported at; `off` disables it. */
export const SeverityLevelSchema = z.enum(['error', 'warning', 'off']);

/** File scanning patterns configuration. */
export const FileScanPatternsSchema = z.object({
  /** Glob patterns for files to include */
  include: z.array(z.string()).default(['**/*.ts', '**/*.tsx']),
  /** Glob patterns for files to exclude */
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/*.d.ts',
  ]),
});

/** Per-rule severity overrides, keyed by rule id. */
export const RuleLevelsSchema = z
  .record(z.string(), SeverityLevelSchema)
  .superRefine((rules, ctx) => {
    const known = new Set<string>(RULE_IDS);
    for (const ruleId of Object.keys(rules)) {
      if (!known.has(ruleId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown rule: ${ruleId}`,
          path: [ruleId],
        });
      }
    }
  });

/** Complete configuration schema. */
export const ConfigSchema = z.object({
  /** Modules whose decorators are recognized as argument metadata */
  modules: z.array(z.string().min(1)).min(1).default([...DEFAULT_ARGUMENT_MODULES]),
  files: withDefaults(FileScanPatternsSchema),
  /** Report @ArgumentGroup names the action enum does not declare */
  strict_groups: z.boolean().default(false),
  rules: withDefaults(RuleLevelsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type FileScanPatterns = z.infer<typeof FileScanPatternsSchema>;
export type RuleLevels = z.infer<typeof RuleLevelsSchema>;

/** A config document; an empty file reads as all defaults. */
export const ConfigFileSchema = withDefaults(ConfigSchema);
