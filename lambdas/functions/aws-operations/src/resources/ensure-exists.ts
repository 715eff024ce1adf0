import { createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';
import { setTimeout as sleep } from 'timers/promises';

import { withDeadline } from '../operations/deadline';
import { OperationTimeoutError, errorMessage, errorName } from './errors';

const logger = createChildLogger('ensure-exists');

export type ResourceState = 'NOT_FOUND' | 'CREATING' | 'ACTIVE' | 'ERROR';

/**
 * Lifecycle of one ensure-exists attempt. ACTIVE and FAILED are terminal.
 */
export type EnsureExistsState = 'UNCHECKED' | 'CHECKING' | 'NOT_FOUND' | 'CREATING' | 'ACTIVE' | 'FAILED';

export interface ResourceManager {
  /** Human readable resource kind, e.g. `bucket` or `table`. */
  readonly kind: string;
  describe(name: string): Promise<ResourceState>;
  create(name: string): Promise<void>;
  /** True when a create call failed because the resource already exists (e.g. a concurrent creator). */
  isAlreadyExists(error: unknown): boolean;
}

export interface EnsureExistsOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  onTransition?: (from: EnsureExistsState, to: EnsureExistsState) => void;
}

export const DEFAULT_ENSURE_EXISTS_OPTIONS: EnsureExistsOptions = {
  timeoutMs: 60_000,
  pollIntervalMs: 2_000,
};

/**
 * Make sure a named resource exists and is ready for use, creating it when missing.
 *
 * Safe against concurrent creators: an "already exists" answer to the create call counts as
 * success. The whole attempt is bounded by `timeoutMs`, including a describe or create call
 * that never answers.
 *
 * @returns true when the resource ended up ACTIVE.
 */
export async function ensureExists(
  manager: ResourceManager,
  name: string,
  options: EnsureExistsOptions = DEFAULT_ENSURE_EXISTS_OPTIONS,
): Promise<boolean> {
  const deadline = Date.now() + options.timeoutMs;
  let state: EnsureExistsState = 'UNCHECKED';
  const transition = (next: EnsureExistsState, attributes: Record<string, unknown> = {}): void => {
    logger.debug(`${manager.kind} ${name}: ${state} -> ${next}`, { resourceName: name, ...attributes });
    options.onTransition?.(state, next);
    state = next;
  };
  const attempt: Attempt = {
    manager,
    name,
    options,
    deadline,
    transition,
    bounded: (call) =>
      withDeadline(`ensure ${manager.kind} ${name}`, Math.max(0, deadline - Date.now()), () => call()),
  };

  transition('CHECKING');
  let observed: ResourceState;
  try {
    observed = await attempt.bounded(() => manager.describe(name));
  } catch (error) {
    return fail(attempt, 'describe', error);
  }

  switch (observed) {
    case 'ACTIVE':
      transition('ACTIVE');
      logger.info(`${manager.kind} ${name} already exists`);
      return true;
    case 'ERROR':
      transition('FAILED', { resourceState: observed });
      logger.warn(`${manager.kind} ${name} is in an unusable state`);
      return false;
    case 'CREATING':
      transition('CREATING');
      break;
    case 'NOT_FOUND':
      transition('NOT_FOUND');
      try {
        logger.info(`Creating ${manager.kind} ${name}`);
        await attempt.bounded(() => manager.create(name));
        transition('CREATING');
      } catch (error) {
        if (manager.isAlreadyExists(error)) {
          transition('ACTIVE', { reason: 'already exists' });
          logger.info(`${manager.kind} ${name} was created concurrently`);
          return true;
        }
        return fail(attempt, 'create', error);
      }
      break;
  }

  return waitUntilActive(attempt);
}

interface Attempt {
  manager: ResourceManager;
  name: string;
  options: EnsureExistsOptions;
  deadline: number;
  transition: (next: EnsureExistsState, attributes?: Record<string, unknown>) => void;
  /** Runs a collaborator call, rejecting with an OperationTimeoutError once the deadline passes. */
  bounded: <T>(call: () => Promise<T>) => Promise<T>;
}

function fail(attempt: Attempt, action: string, error: unknown): false {
  const { manager, name, transition } = attempt;
  if (error instanceof OperationTimeoutError) {
    return timedOut(attempt, action);
  }
  transition('FAILED', { error: errorMessage(error), errorType: errorName(error) });
  logger.error(`Failed to ${action} ${manager.kind} ${name}`, { error });
  return false;
}

function timedOut({ manager, name, options, transition }: Attempt, action: string): false {
  transition('FAILED', { reason: 'timeout', timeoutMs: options.timeoutMs });
  logger.warn(`Timed out after ${options.timeoutMs} ms on ${action} of ${manager.kind} ${name}`);
  return false;
}

async function waitUntilActive(attempt: Attempt): Promise<boolean> {
  const { manager, name, options, deadline, transition } = attempt;

  while (Date.now() < deadline) {
    await sleep(Math.min(options.pollIntervalMs, Math.max(0, deadline - Date.now())));
    if (Date.now() >= deadline) {
      break;
    }

    let observed: ResourceState;
    try {
      observed = await attempt.bounded(() => manager.describe(name));
    } catch (error) {
      return fail(attempt, 'poll', error);
    }

    if (observed === 'ACTIVE') {
      transition('ACTIVE');
      logger.info(`${manager.kind} ${name} is ready`);
      return true;
    }
    if (observed === 'ERROR') {
      transition('FAILED', { resourceState: observed });
      logger.warn(`${manager.kind} ${name} ended in an unusable state while waiting`);
      return false;
    }
    // NOT_FOUND right after a create is eventual consistency, keep polling
  }

  return timedOut(attempt, 'wait');
}
