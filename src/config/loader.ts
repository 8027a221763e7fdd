/**
 * Configuration loader
 */

import { dirname, resolve } from '../deps.ts';
import type { Result } from '../shared/result.ts';
import { failure, success, toError } from '../shared/result.ts';
import type { DomainError } from '../shared/errors.ts';
import { createDomainError } from '../shared/errors.ts';
import type { HarnessConfig } from './schema.ts';
import { HarnessConfigSchema } from './schema.ts';

export const DEFAULT_CONFIG_FILE = 'pkgtest.json';

export interface ConfigReader {
  exists(path: string): Promise<boolean>;
  readFile(path: string): Promise<string>;
}

export interface LoadedConfig {
  readonly path: string;
  /** Directory relative paths in the file resolve against */
  readonly baseDir: string;
  readonly config: HarnessConfig;
}

/**
 * Parses configuration text; `source` only labels errors
 */
export const parseConfig = (text: string, source: string): Result<HarnessConfig, DomainError> => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return failure(createDomainError({
      domain: 'application',
      kind: 'ConfigInvalid',
      details: { path: source, issues: [toError(error).message] },
    }));
  }

  const parsed = HarnessConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return failure(createDomainError({
      domain: 'application',
      kind: 'ConfigInvalid',
      details: {
        path: source,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      },
    }));
  }

  return success(parsed.data);
};

export const loadConfig = async (
  path: string,
  reader: ConfigReader,
  cwd: string,
): Promise<Result<LoadedConfig, DomainError>> => {
  const absolute = resolve(cwd, path);
  if (!(await reader.exists(absolute))) {
    return failure(createDomainError({
      domain: 'application',
      kind: 'ConfigNotFound',
      details: { path: absolute },
    }));
  }

  let text: string;
  try {
    text = await reader.readFile(absolute);
  } catch (error) {
    return failure(createDomainError({
      domain: 'application',
      kind: 'ConfigInvalid',
      details: { path: absolute, issues: [toError(error).message] },
    }));
  }

  const config = parseConfig(text, absolute);
  if (!config.ok) {
    return config;
  }

  return success({ path: absolute, baseDir: dirname(absolute), config: config.data });
};
