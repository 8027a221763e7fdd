/**
 * The current version of pkgtest, kept in step with package.json.
 * @module
 */
export const VERSION = '0.1.0';
