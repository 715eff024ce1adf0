import { setTimeout as sleep } from 'timers/promises';
import { describe, it, expect, vi } from 'vitest';

import { EnsureExistsState, ResourceManager, ResourceState, ensureExists } from './ensure-exists';

const fastOptions = { timeoutMs: 200, pollIntervalMs: 5 };

class AlreadyExistsError extends Error {
  constructor() {
    super('Resource already exists');
    this.name = 'AlreadyExistsError';
  }
}

/**
 * In-memory resource manager: a created resource becomes ACTIVE after `pollsUntilActive` describe calls.
 */
class FakeResourceManager implements ResourceManager {
  readonly kind = 'table';
  readonly resources = new Map<string, { state: ResourceState; pendingPolls: number }>();
  createCalls = 0;
  describeCalls = 0;

  constructor(private readonly pollsUntilActive = 1) {}

  async describe(name: string): Promise<ResourceState> {
    this.describeCalls++;
    const resource = this.resources.get(name);
    if (!resource) {
      return 'NOT_FOUND';
    }
    if (resource.state === 'CREATING') {
      if (resource.pendingPolls <= 0) {
        resource.state = 'ACTIVE';
      } else {
        resource.pendingPolls--;
      }
    }
    return resource.state;
  }

  async create(name: string): Promise<void> {
    this.createCalls++;
    if (this.resources.has(name)) {
      throw new AlreadyExistsError();
    }
    this.resources.set(name, { state: 'CREATING', pendingPolls: this.pollsUntilActive - 1 });
  }

  isAlreadyExists(error: unknown): boolean {
    return error instanceof AlreadyExistsError;
  }
}

describe('ensureExists', () => {
  it('should return true without creating when the resource is active', async () => {
    const manager = new FakeResourceManager();
    manager.resources.set('example-table', { state: 'ACTIVE', pendingPolls: 0 });

    await expect(ensureExists(manager, 'example-table', fastOptions)).resolves.toBe(true);
    expect(manager.createCalls).toBe(0);
  });

  it('should create a missing resource and wait until it is active', async () => {
    const manager = new FakeResourceManager(2);
    const transitions: string[] = [];

    const result = await ensureExists(manager, 'example-table', {
      ...fastOptions,
      onTransition: (from: EnsureExistsState, to: EnsureExistsState) => transitions.push(`${from}->${to}`),
    });

    expect(result).toBe(true);
    expect(manager.createCalls).toBe(1);
    expect(transitions).toEqual([
      'UNCHECKED->CHECKING',
      'CHECKING->NOT_FOUND',
      'NOT_FOUND->CREATING',
      'CREATING->ACTIVE',
    ]);
  });

  it('should be idempotent across immediate repeated calls', async () => {
    const manager = new FakeResourceManager();

    const first = await ensureExists(manager, 'example-table', fastOptions);
    const second = await ensureExists(manager, 'example-table', fastOptions);

    expect(first).toBe(true);
    expect(second).toBe(true);
    expect(manager.createCalls).toBe(1);
  });

  it('should treat an already exists answer from a concurrent creator as success', async () => {
    const manager = new FakeResourceManager();
    // another invocation creates the table between our describe and create calls
    vi.spyOn(manager, 'describe').mockResolvedValueOnce('NOT_FOUND');
    manager.resources.set('example-table', { state: 'CREATING', pendingPolls: 5 });
    const transitions: string[] = [];

    const result = await ensureExists(manager, 'example-table', {
      ...fastOptions,
      onTransition: (from, to) => transitions.push(`${from}->${to}`),
    });

    expect(result).toBe(true);
    expect(manager.createCalls).toBe(1);
    expect(transitions).toEqual(['UNCHECKED->CHECKING', 'CHECKING->NOT_FOUND', 'NOT_FOUND->ACTIVE']);
  });

  it('should wait for a resource found in creating state', async () => {
    const manager = new FakeResourceManager();
    manager.resources.set('example-table', { state: 'CREATING', pendingPolls: 1 });

    await expect(ensureExists(manager, 'example-table', fastOptions)).resolves.toBe(true);
    expect(manager.createCalls).toBe(0);
  });

  it('should give up once the deadline passes for a resource stuck in creating', async () => {
    const manager = new FakeResourceManager();
    vi.spyOn(manager, 'describe').mockResolvedValue('CREATING');
    const transitions: string[] = [];
    const started = Date.now();

    const result = await ensureExists(manager, 'example-table', {
      timeoutMs: 50,
      pollIntervalMs: 10,
      onTransition: (from, to) => transitions.push(`${from}->${to}`),
    });

    expect(result).toBe(false);
    expect(transitions.at(-1)).toBe('CREATING->FAILED');
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should not wait for a poll that outlives the deadline', async () => {
    const manager = new FakeResourceManager();
    vi.spyOn(manager, 'describe')
      .mockResolvedValueOnce('CREATING')
      .mockImplementationOnce(async () => {
        await sleep(1000);
        return 'ACTIVE';
      });
    const transitions: string[] = [];
    const started = Date.now();

    const result = await ensureExists(manager, 'example-table', {
      timeoutMs: 100,
      pollIntervalMs: 10,
      onTransition: (from, to) => transitions.push(`${from}->${to}`),
    });

    expect(result).toBe(false);
    expect(transitions.at(-1)).toBe('CREATING->FAILED');
    expect(Date.now() - started).toBeLessThan(500);
  });

  it('should not wait for a first describe that outlives the deadline', async () => {
    const manager = new FakeResourceManager();
    vi.spyOn(manager, 'describe').mockImplementation(async () => {
      await sleep(1000);
      return 'ACTIVE';
    });
    const transitions: string[] = [];
    const started = Date.now();

    const result = await ensureExists(manager, 'example-table', {
      timeoutMs: 50,
      pollIntervalMs: 10,
      onTransition: (from, to) => transitions.push(`${from}->${to}`),
    });

    expect(result).toBe(false);
    expect(transitions).toEqual(['UNCHECKED->CHECKING', 'CHECKING->FAILED']);
    expect(Date.now() - started).toBeLessThan(500);
  });

  it('should not wait for a create call that outlives the deadline', async () => {
    const manager = new FakeResourceManager();
    const create = vi.spyOn(manager, 'create').mockImplementation(async () => {
      await sleep(1000);
    });
    const started = Date.now();

    const result = await ensureExists(manager, 'example-table', { timeoutMs: 50, pollIntervalMs: 10 });

    expect(result).toBe(false);
    expect(create).toHaveBeenCalledTimes(1);
    expect(Date.now() - started).toBeLessThan(500);
  });

  it('should fail when describe throws', async () => {
    const manager = new FakeResourceManager();
    vi.spyOn(manager, 'describe').mockRejectedValue(new Error('AccessDenied'));

    await expect(ensureExists(manager, 'example-table', fastOptions)).resolves.toBe(false);
    expect(manager.createCalls).toBe(0);
  });

  it('should fail when the resource is in an unusable state', async () => {
    const manager = new FakeResourceManager();
    manager.resources.set('example-table', { state: 'ERROR', pendingPolls: 0 });

    await expect(ensureExists(manager, 'example-table', fastOptions)).resolves.toBe(false);
  });

  it('should fail when create fails for another reason', async () => {
    const manager = new FakeResourceManager();
    vi.spyOn(manager, 'create').mockRejectedValue(new Error('LimitExceededException'));

    await expect(ensureExists(manager, 'example-table', fastOptions)).resolves.toBe(false);
  });

  it('should keep polling while a just created resource is not yet visible', async () => {
    const manager = new FakeResourceManager();
    vi.spyOn(manager, 'describe')
      .mockResolvedValueOnce('NOT_FOUND')
      .mockResolvedValueOnce('NOT_FOUND')
      .mockResolvedValueOnce('ACTIVE');
    vi.spyOn(manager, 'create').mockResolvedValue(undefined);

    await expect(ensureExists(manager, 'example-bucket', fastOptions)).resolves.toBe(true);
  });
});
