/**
 * File System Adapter
 * Implements file system interfaces for domains
 */

import { fse, join } from '../../deps.ts';
import type { Result } from '../../shared/result.ts';
import { tryResult } from '../../shared/result.ts';
import type { HarnessFileSystem } from '../../domains/orchestrator/domain-orchestrator.ts';
import type { ProfileStore } from '../../domains/test-execution/coverage-runner.ts';

/**
 * fs-extra backed file system adapter
 */
class NodeFileSystemAdapter implements HarnessFileSystem {
  async exists(path: string): Promise<boolean> {
    return await fse.pathExists(path);
  }

  async readFile(path: string): Promise<string> {
    return await fse.readFile(path, 'utf8');
  }

  write(path: string, content: string): Promise<Result<void, Error>> {
    return tryResult(() => fse.outputFile(path, content));
  }

  ensureDir(path: string): Promise<Result<void, Error>> {
    return tryResult(() => fse.ensureDir(path));
  }

  makeTempDir(parent: string): Promise<Result<string, Error>> {
    return tryResult(() => fse.mkdtemp(join(parent, 'run-')));
  }

  remove(path: string): Promise<Result<void, Error>> {
    return tryResult(() => fse.remove(path));
  }
}

/**
 * Cover profiles kept as files in one directory
 */
class FileProfileStore implements ProfileStore {
  private allocated = 0;

  constructor(private readonly dir: string) {}

  allocate(pkg: string): Promise<Result<string, Error>> {
    const path = join(this.dir, `cover-${++this.allocated}-${pkg.replace(/[^\w.-]+/g, '_')}.out`);
    return tryResult(async () => {
      await fse.ensureDir(this.dir);
      return path;
    });
  }

  read(path: string): Promise<Result<string, Error>> {
    return tryResult(() => fse.readFile(path, 'utf8'));
  }

  release(path: string): Promise<Result<void, Error>> {
    return tryResult(() => fse.remove(path));
  }
}

/**
 * Create file system adapter
 */
export function createFileSystemAdapter(): HarnessFileSystem {
  return new NodeFileSystemAdapter();
}

export function createProfileStore(dir: string): ProfileStore {
  return new FileProfileStore(dir);
}
