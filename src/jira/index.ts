export { createJiraApi, type JiraApi, type JiraClientOptions } from './client.js';
export { createTrackerClient, type TrackerClient } from './tracker.js';
export { buildTaskJql, quoteJqlValue } from './jql.js';
export * from './types.js';

import { createJiraApi, type JiraClientOptions } from './client.js';
import { createTrackerClient, type TrackerClient } from './tracker.js';

export function createTracker(options: JiraClientOptions): TrackerClient {
  return createTrackerClient(createJiraApi(options));
}

/**
 * Defer building the tracker until the first call, then reuse it. Used so
 * that help and parse failures never need configuration.
 */
export function createLazyTracker(factory: () => TrackerClient): () => TrackerClient {
  let tracker: TrackerClient | undefined;
  return () => {
    tracker ??= factory();
    return tracker;
  };
}
