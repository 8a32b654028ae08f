/**
 * Poller - periodic refresh of poll-flagged parameters
 *
 * - One cycle at a time; due instances are queried one after another
 *   through the Dispatcher, so polls never overlap user writes
 * - Effective period = max(own interval, global minimum)
 * - A transport-level failure suspends polling until start() is called
 *   again after reconnection; parameter-level failures are reported by the
 *   Dispatcher and polling continues
 */

import type { InstrumentSchema, ParameterDescriptor, ParameterInstance } from '../devices/types.js';
import { isTransportError } from '../devices/errors.js';
import { listParameterInstances } from '../devices/schema.js';
import type { Dispatcher } from './Dispatcher.js';

export const MIN_POLL_INTERVAL_S = 0.05;
export const MAX_POLL_INTERVAL_S = 1000;
export const DEFAULT_POLL_INTERVAL_S = 5;

export interface PollerConfig {
  minIntervalSeconds?: number;
}

export interface Poller {
  start(): void;
  /** Cancel the timer; a cycle already running finishes its current query */
  halt(): void;
  /** halt() and wait for the in-flight cycle */
  stop(): Promise<void>;
  /** Returns the clamped value actually applied */
  setMinInterval(seconds: number): number;
  getMinInterval(): number;
  /** null for parameters that are not polled */
  getEffectiveIntervalMs(descriptor: ParameterDescriptor): number | null;
  isRunning(): boolean;
}

export function clampPollInterval(seconds: number): number {
  if (!Number.isFinite(seconds)) return DEFAULT_POLL_INTERVAL_S;
  return Math.min(MAX_POLL_INTERVAL_S, Math.max(MIN_POLL_INTERVAL_S, seconds));
}

export function createPoller(
  schema: InstrumentSchema,
  dispatcher: Dispatcher,
  config: PollerConfig = {}
): Poller {
  let minIntervalSeconds = clampPollInterval(config.minIntervalSeconds ?? DEFAULT_POLL_INTERVAL_S);

  const polled: ParameterInstance[] = listParameterInstances(schema)
    .filter(i => i.descriptor.pollIntervalSeconds !== undefined);
  const nextDueAt = new Map<ParameterInstance, number>();

  let running = false;
  // Bumped by start()/halt() so a stale cycle stops early
  let generation = 0;
  let pollTimer: ReturnType<typeof setTimeout> | null = null;
  let pollInProgress: Promise<void> | null = null;

  function intervalMs(descriptor: ParameterDescriptor): number | null {
    if (descriptor.pollIntervalSeconds === undefined) return null;
    return Math.max(descriptor.pollIntervalSeconds, minIntervalSeconds) * 1000;
  }

  function clearTimer(): void {
    if (pollTimer) {
      clearTimeout(pollTimer);
      pollTimer = null;
    }
  }

  function schedule(): void {
    clearTimer();
    if (!running || polled.length === 0) return;

    let earliest = Infinity;
    for (const due of nextDueAt.values()) {
      earliest = Math.min(earliest, due);
    }
    pollTimer = setTimeout(poll, Math.max(0, earliest - Date.now()));
  }

  // Internal poll implementation
  async function doPoll(cycle: number): Promise<void> {
    for (const instance of polled) {
      if (!running || cycle !== generation) return;

      const due = nextDueAt.get(instance) ?? 0;
      if (due > Date.now()) continue;

      const result = await dispatcher.query(instance.descriptor, instance.channel);
      nextDueAt.set(instance, Date.now() + (intervalMs(instance.descriptor) ?? 0));

      if (!result.ok && isTransportError(result.error)) {
        // Link is gone; the supervisor restarts us after reconnecting
        if (cycle === generation) {
          running = false;
          clearTimer();
        }
        return;
      }
    }
  }

  // Poll wrapper that tracks when poll is in progress
  function poll(): void {
    pollTimer = null;
    // One cycle at a time; the running one reschedules when it ends
    if (pollInProgress) return;

    pollInProgress = doPoll(generation).finally(() => {
      pollInProgress = null;
      if (running && !pollTimer) schedule();
    });
  }

  function halt(): void {
    running = false;
    generation++;
    clearTimer();
  }

  return {
    start(): void {
      halt();
      running = true;
      const now = Date.now();
      for (const instance of polled) {
        nextDueAt.set(instance, now + (intervalMs(instance.descriptor) ?? 0));
      }
      schedule();
    },

    halt,

    async stop(): Promise<void> {
      halt();
      if (pollInProgress) {
        await pollInProgress;
      }
    },

    setMinInterval(seconds: number): number {
      minIntervalSeconds = clampPollInterval(seconds);
      if (running) {
        const now = Date.now();
        for (const instance of polled) {
          nextDueAt.set(instance, now + (intervalMs(instance.descriptor) ?? 0));
        }
        schedule();
      }
      return minIntervalSeconds;
    },

    getMinInterval(): number {
      return minIntervalSeconds;
    },

    getEffectiveIntervalMs(descriptor: ParameterDescriptor): number | null {
      return intervalMs(descriptor);
    },

    isRunning(): boolean {
      return running;
    },
  };
}
