/**
 * Project Poller
 * Finds checkouts whose upstream branch moved past the local HEAD
 */

import { resolve } from '../../deps.ts';
import type { HarnessLogger } from '../../core/logger.ts';
import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { DomainError } from '../../shared/errors.ts';
import { createDomainError } from '../../shared/errors.ts';
import type { ProjectSpec } from '../../config/schema.ts';
import type { ProcessExecutor } from '../test-execution/types.ts';

export interface ProjectRevision {
  readonly project: string;
  readonly head: string;
  readonly upstream: string;
}

export interface PollReport {
  readonly checked: readonly ProjectRevision[];
  /** Names of projects with new upstream commits, sorted */
  readonly changed: readonly string[];
}

export const upstreamRef = (spec: ProjectSpec): string => {
  return spec.branch ? `${spec.remote}/${spec.branch}` : '@{upstream}';
};

export class ProjectPoller {
  constructor(
    private readonly executor: ProcessExecutor,
    private readonly baseDir: string,
    private readonly logger?: HarnessLogger,
  ) {}

  async poll(projects: Readonly<Record<string, ProjectSpec>>): Promise<Result<PollReport, DomainError>> {
    const checked: ProjectRevision[] = [];

    for (const name of Object.keys(projects).sort()) {
      const revision = await this.check(name, projects[name]);
      if (!revision.ok) {
        return revision;
      }
      checked.push(revision.data);
    }

    const changed = checked
      .filter((revision) => revision.head !== revision.upstream)
      .map((revision) => revision.project);

    return success({ checked, changed });
  }

  async check(name: string, spec: ProjectSpec): Promise<Result<ProjectRevision, DomainError>> {
    const cwd = resolve(this.baseDir, spec.path);
    this.logger?.logDebug(`polling ${name} in ${cwd}`);

    const fetchArgs = spec.branch ? ['git', 'fetch', spec.remote, spec.branch] : ['git', 'fetch', spec.remote];
    const fetched = await this.git(fetchArgs, cwd);
    if (!fetched.ok) {
      return failure(createDomainError({
        domain: 'polling',
        kind: 'FetchFailed',
        details: { project: name, error: fetched.error },
      }));
    }

    const head = await this.revParse('HEAD', cwd);
    if (!head.ok) {
      return failure(this.lookupError(name, head.error));
    }
    const upstream = await this.revParse(upstreamRef(spec), cwd);
    if (!upstream.ok) {
      return failure(this.lookupError(name, upstream.error));
    }

    return success({ project: name, head: head.data, upstream: upstream.data });
  }

  private lookupError(project: string, error: string): DomainError {
    return createDomainError({
      domain: 'polling',
      kind: 'RevisionLookupFailed',
      details: { project, error },
    });
  }

  private async revParse(ref: string, cwd: string): Promise<Result<string, string>> {
    const result = await this.git(['git', 'rev-parse', ref], cwd);
    return result.ok ? success(result.data.trim()) : result;
  }

  private async git(command: readonly string[], cwd: string): Promise<Result<string, string>> {
    const result = await this.executor.execute(command, { cwd });
    if (!result.ok) {
      return failure(`${command.join(' ')}: ${result.error.message}`);
    }
    if (result.data.exitCode !== 0) {
      return failure(`${command.join(' ')} exited with ${result.data.exitCode}: ${result.data.output.trim()}`);
    }
    return success(result.data.stdout);
  }
}

/**
 * Console text for a poll: the changed projects and the tests they trigger
 */
export const formatPollReport = (report: PollReport, tests: readonly string[]): string => {
  if (report.changed.length === 0) {
    return 'No changes.\n';
  }
  let text = `Projects with new changes:\n${report.changed.join('\n')}\n`;
  text += `\nTests to run:\n${tests.join('\n')}\n`;
  return text;
};
