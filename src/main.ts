import { DomainOrchestrator } from './domains/orchestrator/index.ts';
import { EXIT_FAILED } from './domains/orchestrator/index.ts';
import { createEventBus } from './shared/event-bus.ts';
import { createInfrastructureAdapters } from './infrastructure/index.ts';

/**
 * Main entry point for pkgtest; resolves to the exit code it also sets on the process
 */
export async function main(args: string[]): Promise<number> {
  try {
    // Create event bus for domain communication
    const eventBus = createEventBus();

    // Create infrastructure adapters
    const adapters = createInfrastructureAdapters();

    const orchestrator = new DomainOrchestrator(adapters, eventBus);
    const exitCode = await orchestrator.orchestrate(args);

    process.exitCode = exitCode;
    return exitCode;
  } catch (error) {
    console.error(
      `❌ Unexpected error: ${error instanceof Error ? error.message : String(error)}`,
    );
    if (error instanceof Error && error.stack) {
      console.error('Stack trace:', error.stack);
    }
    process.exitCode = EXIT_FAILED;
    return EXIT_FAILED;
  }
}
