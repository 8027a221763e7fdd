/**
 * Configuration file schema
 */

import { z } from '../deps.ts';
import { hasEntry } from '../shared/record.ts';

const PredicateSchema = z.object({
  os: z.array(z.string()).optional(),
  arch: z.array(z.string()).optional(),
  ci: z.boolean().optional(),
}).strict();

export const ExclusionRuleSchema = z.object({
  package: z.string().min(1),
  test: z.string().min(1).default('.*'),
  when: PredicateSchema.optional(),
  reason: z.string().optional(),
}).strict();

export const TestKindSchema = z.enum(['build', 'test', 'coverage']);

export const TestSpecSchema = z.object({
  kind: TestKindSchema.default('test'),
  description: z.string().optional(),
  /** `go list` patterns */
  packages: z.array(z.string().min(1)).min(1).default(['./...']),
  args: z.array(z.string()).default([]),
  nonTestArgs: z.array(z.string()).default([]),
  /** Go duration; defaults to 20m for tests, 5m for coverage */
  timeout: z.string().optional(),
  /** Base of the `[<base> - <os>,<arch>]` case-name suffix */
  suffix: z.string().optional(),
  /** Names of exclusion sets */
  exclusions: z.array(z.string()).default([]),
  testPattern: z.string().default('^Test'),
  requireTestingT: z.boolean().default(false),
  /** Shard specs, each a comma-separated list of `go list` patterns */
  parts: z.array(z.string().min(1)).default([]),
  dependsOn: z.array(z.string()).default([]),
  projects: z.array(z.string()).default([]),
  suppressOutput: z.boolean().default(false),
  numWorkers: z.number().int().positive().optional(),
  /** Compile test dependencies before dispatching */
  prebuild: z.boolean().default(true),
  env: z.record(z.string()).default({}),
}).strict();

export const ProjectSchema = z.object({
  /** Checkout directory, relative to the configuration file */
  path: z.string().min(1),
  branch: z.string().optional(),
  remote: z.string().default('origin'),
}).strict();

export const HarnessConfigSchema = z.object({
  /** Go module root, relative to the configuration file */
  root: z.string().default('.'),
  tests: z.record(TestSpecSchema),
  exclusions: z.record(z.array(ExclusionRuleSchema)).default({}),
  projects: z.record(ProjectSchema).default({}),
}).strict().superRefine((config, ctx) => {
  for (const [name, spec] of Object.entries(config.tests)) {
    for (const set of spec.exclusions) {
      if (!hasEntry(config.exclusions, set)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tests', name, 'exclusions'],
          message: `unknown exclusion set "${set}"`,
        });
      }
    }
    for (const dependency of spec.dependsOn) {
      if (!hasEntry(config.tests, dependency)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tests', name, 'dependsOn'],
          message: `unknown test "${dependency}"`,
        });
      }
    }
    for (const project of spec.projects) {
      if (!hasEntry(config.projects, project)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tests', name, 'projects'],
          message: `unknown project "${project}"`,
        });
      }
    }
  }
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type TestSpec = z.infer<typeof TestSpecSchema>;
export type TestKind = z.infer<typeof TestKindSchema>;
export type ProjectSpec = z.infer<typeof ProjectSchema>;
