/**
 * Polling Domain
 */

export { formatPollReport, ProjectPoller, upstreamRef } from './project-poller.ts';
export type { PollReport, ProjectRevision } from './project-poller.ts';
