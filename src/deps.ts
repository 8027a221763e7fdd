/**
 * External dependencies
 */

export { default as parseArgs } from 'minimist';
export { default as chalk, Chalk } from 'chalk';
export type { ChalkInstance } from 'chalk';
export { default as fse } from 'fs-extra';
export { execa } from 'execa';
export { z } from 'zod';
export { dirname, join, resolve } from 'node:path';
