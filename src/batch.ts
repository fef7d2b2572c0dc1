import { CancellationError } from './errors.js';
import { silentLogger, type Logger } from './observability/log.js';

export type Settled<V> =
  | { status: 'fulfilled'; value: V }
  | { status: 'rejected'; error: unknown };

export type BatchResult<K, V> = ReadonlyMap<K, Settled<V>>;

export type TaskState = 'pending' | 'running' | 'fulfilled' | 'rejected' | 'cancelled';

export type BatchTask<T, V> = (target: T, signal: AbortSignal) => Promise<V>;

export type BatchOptions = {
  maxConcurrency?: number; // 0 or undefined = one task per target, all at once
  signal?: AbortSignal;
  logger?: Logger;
  label?: string;
};

/**
 * Structured fan-out/fan-in: one task per target, joined into a result per index.
 * A failing task only fails its own slot. Cancellation of the shared signal rejects
 * the whole group at once; queued tasks never start and late results are dropped.
 */
export function runTaskGroup<T, V>(targets: readonly T[], task: BatchTask<T, V>, opts: BatchOptions = {}): Promise<Settled<V>[]> {
  const { signal } = opts;
  if (signal?.aborted) return Promise.reject(new CancellationError(signal.reason));
  const log = opts.logger ?? silentLogger;
  const label = opts.label ?? 'batch';
  const limit = opts.maxConcurrency && opts.maxConcurrency > 0 ? Math.max(1, Math.floor(opts.maxConcurrency)) : Infinity;
  const taskSignal = signal ?? new AbortController().signal;
  const states = targets.map((): TaskState => 'pending');
  const results: Array<Settled<V> | undefined> = targets.map(() => undefined);
  const t0 = Date.now();

  const summary = () => {
    const counts: Record<TaskState, number> = { pending: 0, running: 0, fulfilled: 0, rejected: 0, cancelled: 0 };
    for (const s of states) counts[s] += 1;
    return { label, targets: targets.length, ms: Date.now() - t0, ...counts };
  };

  return new Promise<Settled<V>[]>((resolve, reject) => {
    let next = 0;
    let active = 0;
    let done = 0;
    let finished = false;

    const cleanup = () => { signal?.removeEventListener('abort', onAbort); };

    const cancel = (reason: unknown) => {
      if (finished) return;
      finished = true;
      cleanup();
      for (let i = 0; i < states.length; i++) if (states[i] === 'running') states[i] = 'cancelled';
      log.warn(`${label}.cancelled`, summary());
      reject(reason instanceof CancellationError ? reason : new CancellationError(reason));
    };

    function onAbort() { cancel(signal?.reason); }

    const settle = (i: number, s: Settled<V>) => {
      if (finished) return;
      results[i] = s;
      states[i] = s.status;
      active -= 1;
      done += 1;
      if (done === targets.length) {
        finished = true;
        cleanup();
        log.info(`${label}.done`, summary());
        resolve(results.filter((r): r is Settled<V> => r !== undefined));
        return;
      }
      launch();
    };

    const launch = () => {
      while (!finished && active < limit && next < targets.length) {
        if (signal?.aborted) { onAbort(); return; }
        const i = next++;
        states[i] = 'running';
        active += 1;
        void Promise.resolve()
          .then(() => task(targets[i], taskSignal))
          .then(
            value => settle(i, { status: 'fulfilled', value }),
            error => {
              if (error instanceof CancellationError) cancel(error);
              else settle(i, { status: 'rejected', error });
            },
          );
      }
    };

    if (targets.length === 0) { resolve([]); return; }
    signal?.addEventListener('abort', onAbort, { once: true });
    launch();
  });
}

export type KeyedBatchOptions<T, K> = BatchOptions & { keyOf: (target: T) => K };

/**
 * Keyed variant: one entry per distinct key, in first-seen target order.
 * Targets whose key repeats share the entry of the first one and start no task.
 */
export function dispatchBatch<T, V>(targets: readonly T[], task: BatchTask<T, V>, opts?: BatchOptions): Promise<BatchResult<T, V>>;
export function dispatchBatch<T, V, K>(targets: readonly T[], task: BatchTask<T, V>, opts: KeyedBatchOptions<T, K>): Promise<BatchResult<K, V>>;
export async function dispatchBatch<T, V, K>(
  targets: readonly T[],
  task: BatchTask<T, V>,
  opts: BatchOptions & { keyOf?: (target: T) => K } = {},
): Promise<BatchResult<T | K, V>> {
  const firstByKey = new Map<T | K, T>();
  for (const t of targets) {
    const k = opts.keyOf ? opts.keyOf(t) : t;
    if (!firstByKey.has(k)) firstByKey.set(k, t);
  }
  const keys = [...firstByKey.keys()];
  const settled = await runTaskGroup([...firstByKey.values()], task, opts);
  const out = new Map<T | K, Settled<V>>();
  keys.forEach((k, i) => out.set(k, settled[i]));
  return out;
}

/** Per-call options win; unset ones fall back to the client's defaults. */
export function withBatchDefaults(defaults: BatchOptions, opts: BatchOptions, label: string): BatchOptions {
  return {
    label: opts.label ?? label,
    maxConcurrency: opts.maxConcurrency ?? defaults.maxConcurrency,
    signal: opts.signal ?? defaults.signal,
    logger: opts.logger ?? defaults.logger,
  };
}

/** An AbortSignal that fires after `ms`, or earlier when `parent` aborts. */
export function withDeadline(ms: number, parent?: AbortSignal): AbortSignal {
  const ctrl = new AbortController();
  if (parent?.aborted) { ctrl.abort(parent.reason); return ctrl.signal; }
  const onParent = () => ctrl.abort(parent?.reason);
  const timer = setTimeout(() => ctrl.abort(new Error(`deadline ${ms}ms exceeded`)), ms);
  timer.unref();
  parent?.addEventListener('abort', onParent, { once: true });
  ctrl.signal.addEventListener('abort', () => {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParent);
  }, { once: true });
  return ctrl.signal;
}

export function settledValues<K, V>(r: BatchResult<K, V>): Map<K, V> {
  const out = new Map<K, V>();
  for (const [k, s] of r) if (s.status === 'fulfilled') out.set(k, s.value);
  return out;
}

export function settledErrors<K, V>(r: BatchResult<K, V>): Map<K, unknown> {
  const out = new Map<K, unknown>();
  for (const [k, s] of r) if (s.status === 'rejected') out.set(k, s.error);
  return out;
}
