/**
 * Application Control Domain
 * Exports all public interfaces and implementations
 */

export type {
  ApplicationConfig,
  ApplicationState,
  Command,
  ParsedCliArgs,
} from './types.ts';

export { COMMANDS, isCommand, isValidStateTransition, OutputDirectory, PartIndex } from './types.ts';

export {
  createHelpOutput,
  createVersionOutput,
  HELP_TEXT,
  parseCli,
  splitList,
} from './cli-parser.ts';

export { ApplicationStateManager, type ConfigEnvironment, createApplicationConfig } from './state-manager.ts';
