import { describe, it, expect } from 'vitest';
import { ExecutionRegistry } from '../../src/execution/registry.js';
import { ExecutionStateMachine } from '../../src/execution/state-machine.js';
import { ExecutionAlreadyExistsError, UnknownExecutionError } from '../../src/errors.js';

function machine(id: string): ExecutionStateMachine {
  return new ExecutionStateMachine({
    id,
    language: 'bash',
    code: 'true',
    limits: { timeout_ms: 1000, memory_mb: 64 },
  });
}

describe('ExecutionRegistry', () => {
  it('should register, look up and evict by id', () => {
    const registry = new ExecutionRegistry<{ label: string }>();
    const handle = registry.register(machine('exec_1'), { label: 'first' });

    expect(registry.lookup('exec_1')).toBe(handle);
    expect(handle.context.label).toBe('first');
    expect(registry.size).toBe(1);

    expect(registry.evict('exec_1')).toBe(true);
    expect(registry.evict('exec_1')).toBe(false);
    expect(registry.find('exec_1')).toBeUndefined();
  });

  it('should refuse a duplicate id', () => {
    const registry = new ExecutionRegistry<null>();
    registry.register(machine('exec_1'), null);
    expect(() => registry.register(machine('exec_1'), null)).toThrow(ExecutionAlreadyExistsError);
  });

  it('should throw UnknownExecutionError on lookup of a missing id', () => {
    const registry = new ExecutionRegistry<null>();
    expect(() => registry.lookup('exec_404')).toThrow(UnknownExecutionError);
  });

  it('should count entries matching a predicate', () => {
    const registry = new ExecutionRegistry<null>();
    registry.register(machine('exec_1'), null).machine.start();
    registry.register(machine('exec_2'), null);
    expect(registry.count((handle) => handle.machine.status === 'running')).toBe(1);
    expect(registry.snapshot().map((entry) => entry.execution_id)).toEqual(['exec_1', 'exec_2']);
  });

  it('should hand back and clear every entry on abandonAll', () => {
    const registry = new ExecutionRegistry<null>();
    registry.register(machine('exec_1'), null);
    registry.register(machine('exec_2'), null);

    const abandoned = registry.abandonAll();
    expect(abandoned.map((handle) => handle.id)).toEqual(['exec_1', 'exec_2']);
    expect(registry.size).toBe(0);
  });
});

describe('ExecutionHandle.run', () => {
  it('should run tasks for one execution one at a time in submission order', async () => {
    const registry = new ExecutionRegistry<string[]>();
    const handle = registry.register(machine('exec_1'), []);

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = handle.run(async (_machine, log) => {
      log.push('first:start');
      await gate;
      log.push('first:end');
    });
    const second = handle.run((_machine, log) => {
      log.push('second');
    });

    await Promise.resolve();
    expect(handle.context).toEqual(['first:start']);

    release();
    await Promise.all([first, second]);
    expect(handle.context).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should keep the queue going after a task throws', async () => {
    const registry = new ExecutionRegistry<null>();
    const handle = registry.register(machine('exec_1'), null);

    const failing = handle.run(() => {
      throw new Error('task failed');
    });
    const next = handle.run((m) => m.status);

    await expect(failing).rejects.toThrow('task failed');
    await expect(next).resolves.toBe('pending');
  });
});
