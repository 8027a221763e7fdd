/**
 * System Environment Adapter
 * Implements system environment access
 */

import { cpus, homedir, hostname } from 'node:os';
import type { EnvironmentVariables, SystemEnvironment } from '../../domains/environment-control/types.ts';

/**
 * Node process based system environment adapter
 */
class NodeSystemEnvironment implements SystemEnvironment {
  getEnv(name: string): string | undefined {
    return process.env[name];
  }

  getAllEnv(): EnvironmentVariables {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined) {
        env[key] = value;
      }
    }
    return env;
  }

  getCwd(): string {
    return process.cwd();
  }

  getHostname(): string {
    return hostname();
  }

  getHomeDir(): string {
    return this.getEnv('HOME') ?? homedir();
  }

  getPlatform(): string {
    return process.platform;
  }

  getArch(): string {
    return process.arch;
  }

  getCpuCount(): number {
    return Math.max(1, cpus().length);
  }
}

/**
 * Create system environment adapter
 */
export function createSystemEnvironment(): SystemEnvironment {
  return new NodeSystemEnvironment();
}
