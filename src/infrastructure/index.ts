/**
 * Infrastructure Adapters
 * Creates concrete implementations for domain interfaces
 */

import type { HarnessLogger, LogSink } from '../core/logger.ts';
import type { OrchestratorAdapters } from '../domains/orchestrator/domain-orchestrator.ts';
import { createFileSystemAdapter, createProfileStore } from './adapters/file-system-adapter.ts';
import { createProcessExecutor } from './adapters/process-executor.ts';
import { createSystemEnvironment } from './adapters/system-environment.ts';

/**
 * Create all infrastructure adapters
 */
export function createInfrastructureAdapters(sink?: LogSink): OrchestratorAdapters {
  return {
    system: createSystemEnvironment(),
    fileSystem: createFileSystemAdapter(),
    createExecutor: (logger: HarnessLogger) => createProcessExecutor(logger),
    profileStores: createProfileStore,
    sink,
  };
}

export { createFileSystemAdapter, createProfileStore } from './adapters/file-system-adapter.ts';
export { createProcessExecutor } from './adapters/process-executor.ts';
export { createSystemEnvironment } from './adapters/system-environment.ts';
