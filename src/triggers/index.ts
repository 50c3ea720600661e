/**
 * Trigger dispatcher
 *
 * Maps the platform event that started the job onto one of the three
 * supported triggers. Overlapping triggers are not coordinated: every
 * resolved event gets its own run.
 */

import { RunnerError } from '../shared/errors.js';

export type TriggerType = 'push' | 'schedule' | 'manual';

export interface Trigger {
  type: TriggerType;
  /** Branch the run originates from and pushes back to */
  branch: string;
  /** Triggering revision, when the platform reports one */
  sha?: string;
  /** Cron expression that fired, for schedule triggers */
  cron?: string;
}

export type TriggerResolution =
  | { kind: 'run'; trigger: Trigger }
  | { kind: 'skip'; reason: string };

/**
 * The part of the Actions context the dispatcher reads
 */
export interface TriggerContext {
  eventName: string;
  /** Unset when the job did not come from a branch or tag, or runs outside Actions */
  ref?: string;
  sha?: string;
  payload: { schedule?: unknown; [key: string]: unknown };
}

const EVENT_TRIGGERS: Record<string, TriggerType> = {
  push: 'push',
  schedule: 'schedule',
  workflow_dispatch: 'manual'
};

/**
 * Extract a branch name from a fully qualified ref
 * @param ref - e.g. refs/heads/main; missing outside Actions
 * @returns Branch name, or null for tags, other refs and a missing ref
 */
export function branchFromRef(ref: string | undefined): string | null {
  const prefix = 'refs/heads/';
  if (!ref || !ref.startsWith(prefix) || ref.length === prefix.length) {
    return null;
  }
  return ref.slice(prefix.length);
}

/**
 * Normalise an Actions context that may lack GITHUB_* variables.
 * `@actions/github` reads them without defaults, so outside Actions every
 * field but the payload is undefined; the event then defaults to a manual run.
 */
export function triggerContextFrom(context: {
  eventName?: string;
  ref?: string;
  sha?: string;
  payload?: TriggerContext['payload'];
}): TriggerContext {
  return {
    eventName: context.eventName || 'workflow_dispatch',
    ref: context.ref || '',
    sha: context.sha || '',
    payload: context.payload ?? {}
  };
}

/**
 * Decide whether an event starts a run
 * @param context - Event name, ref, sha and payload
 * @param options.branch - Branch whose pushes trigger a run
 * @returns A run with its trigger, or a skip with the reason
 * @throws RunnerError with category 'trigger' for unsupported events
 */
export function resolveTrigger(
  context: TriggerContext,
  options: { branch: string }
): TriggerResolution {
  const type = EVENT_TRIGGERS[context.eventName];
  if (!type) {
    throw new RunnerError(
      'trigger',
      `Unsupported trigger "${context.eventName}"; expected push, schedule or workflow_dispatch`
    );
  }

  const refBranch = branchFromRef(context.ref);
  const sha = context.sha || undefined;

  if (type === 'push') {
    if (refBranch !== options.branch) {
      return {
        kind: 'skip',
        reason: `push to ${context.ref || '(no ref)'} does not match branch ${options.branch}`
      };
    }
    return { kind: 'run', trigger: { type, branch: refBranch, sha } };
  }

  // schedule and manual runs land on the default branch unless dispatched elsewhere
  const trigger: Trigger = { type, branch: refBranch ?? options.branch, sha };
  if (type === 'schedule' && typeof context.payload.schedule === 'string') {
    trigger.cron = context.payload.schedule;
  }
  return { kind: 'run', trigger };
}

/**
 * One-line description for logs
 */
export function describeTrigger(trigger: Trigger): string {
  const at = trigger.sha ? ` at ${trigger.sha.slice(0, 7)}` : '';
  const cron = trigger.cron ? ` (${trigger.cron})` : '';
  return `${trigger.type}${cron} on ${trigger.branch}${at}`;
}
