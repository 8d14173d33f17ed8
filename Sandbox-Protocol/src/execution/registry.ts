/**
 * Execution Registry: the one shared mutable structure of a connection.
 *
 * Maps execution id to a handle. The registry itself only inserts, looks up
 * and evicts; all execution state changes go through the handle's serial task
 * queue, which is the single owner of its state machine. Registry operations
 * are synchronous Map operations on the event loop, so they never interleave.
 */

import { ExecutionAlreadyExistsError, UnknownExecutionError } from '../errors.js';
import type { ExecutionStateMachine } from './state-machine.js';
import type { ExecutionSnapshot } from './types.js';

/**
 * Owning task for one execution. `run()` chains work so tasks for the same id
 * execute one at a time in submission order (FIFO per id).
 */
export class ExecutionHandle<C> {
  readonly machine: ExecutionStateMachine;
  /** Role-specific per-execution state (backend handle, waiting callers, ...) */
  readonly context: C;
  private tail: Promise<void> = Promise.resolve();

  constructor(machine: ExecutionStateMachine, context: C) {
    this.machine = machine;
    this.context = context;
  }

  get id(): string {
    return this.machine.id;
  }

  run<T>(task: (machine: ExecutionStateMachine, context: C) => T | Promise<T>): Promise<T> {
    const next = this.tail.then(() => task(this.machine, this.context));
    // Keep the chain alive when a task throws; the caller still sees the rejection
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}

export class ExecutionRegistry<C> {
  private readonly handles = new Map<string, ExecutionHandle<C>>();

  register(machine: ExecutionStateMachine, context: C): ExecutionHandle<C> {
    if (this.handles.has(machine.id)) {
      throw new ExecutionAlreadyExistsError(machine.id);
    }
    const handle = new ExecutionHandle(machine, context);
    this.handles.set(machine.id, handle);
    return handle;
  }

  lookup(id: string): ExecutionHandle<C> {
    const handle = this.handles.get(id);
    if (!handle) {
      throw new UnknownExecutionError(id);
    }
    return handle;
  }

  find(id: string): ExecutionHandle<C> | undefined {
    return this.handles.get(id);
  }

  has(id: string): boolean {
    return this.handles.has(id);
  }

  evict(id: string): boolean {
    return this.handles.delete(id);
  }

  get size(): number {
    return this.handles.size;
  }

  count(predicate: (handle: ExecutionHandle<C>) => boolean): number {
    let n = 0;
    for (const handle of this.handles.values()) {
      if (predicate(handle)) n++;
    }
    return n;
  }

  snapshot(): ExecutionSnapshot[] {
    return [...this.handles.values()].map((handle) => handle.machine.snapshot());
  }

  /** Evict every entry at once (connection teardown) and hand them back for finalization */
  abandonAll(): ExecutionHandle<C>[] {
    const all = [...this.handles.values()];
    this.handles.clear();
    return all;
  }
}
