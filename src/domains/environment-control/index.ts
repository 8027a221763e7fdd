/**
 * Environment Control Domain
 */

export type {
  EnvFileSystem,
  EnvironmentVariables,
  SystemEnvironment,
  TestEnvironment,
  TestEnvironmentConfig,
} from './types.ts';

export { EnvironmentManager, genTestNameSuffix } from './environment-manager.ts';
