/**
 * Environment Control Domain Types
 */

import type { Result } from '../../shared/result.ts';

/**
 * Environment variables
 */
export interface EnvironmentVariables {
  readonly [key: string]: string;
}

/**
 * System interface for environment operations
 */
export interface SystemEnvironment {
  getEnv(name: string): string | undefined;
  getAllEnv(): EnvironmentVariables;
  getCwd(): string;
  getHostname(): string;
  getHomeDir(): string;
  /** Node platform name, e.g. `linux` or `win32` */
  getPlatform(): string;
  /** Node architecture name, e.g. `x64` */
  getArch(): string;
  getCpuCount(): number;
}

/**
 * File system operations the environment needs
 */
export interface EnvFileSystem {
  exists(path: string): Promise<boolean>;
  ensureDir(path: string): Promise<Result<void, Error>>;
  /** Creates a uniquely named directory under `parent` */
  makeTempDir(parent: string): Promise<Result<string, Error>>;
  remove(path: string): Promise<Result<void, Error>>;
}

export interface TestEnvironmentConfig {
  readonly testName: string;
  /** Parent of the per-test directories; defaults to `$HOME/tmp` */
  readonly tmpRoot?: string;
  /** Run `go clean -testcache` before the test */
  readonly cleanGo: boolean;
  /** Report files from an earlier run of this test */
  readonly staleFiles: readonly string[];
  /** Extra variables layered over the process environment */
  readonly env: EnvironmentVariables;
  readonly cwd: string;
}

/**
 * Where one named test runs
 */
export interface TestEnvironment {
  readonly testName: string;
  readonly rootDir: string;
  /** Exported as TMPDIR to every child */
  readonly workDir: string;
  readonly binDir: string;
  readonly env: EnvironmentVariables;
}
