/**
 * Package Discovery Domain
 */

export type {
  DiscoveredTests,
  GoPackage,
  SourceReader,
  TestFunctionMatcher,
} from './types.ts';
export { DEFAULT_TEST_NAME_PATTERN } from './types.ts';
export type { ListOptions } from './package-lister.ts';
export { GoPackageLister, parseGoListOutput } from './package-lister.ts';
export {
  createMatcher,
  discoverTests,
  parseTestFunctions,
  TestFunctionFinder,
} from './test-function-finder.ts';
