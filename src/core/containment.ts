/**
 * Fault containment around plugin callbacks.
 *
 * Each callback invocation yields one of three outcomes. A callback the plugin
 * never implemented is detected up front rather than through a thrown fault,
 * and logged differently from one that ran and failed.
 */

import { setTimeout as delay } from "timers/promises";

import { PluginTimeoutError, errorMessage } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";

import type { MaybePromise } from "./types.js";

export type ContainedOutcome<T> =
  | { status: "ok"; value: T }
  | { status: "missing" }
  | { status: "failed"; error: unknown };

/** Identity of the plugin whose callback is invoked, for log messages */
export interface PluginSubject {
  kind: "package" | "auxiliary";
  name: string;
}

/**
 * Bind an optional plugin method to its plugin, or `undefined` when the
 * plugin does not implement it (plugins loaded at run time are untyped, so
 * the check is on the runtime value).
 */
export function bindCallback<A extends unknown[], R>(
  plugin: object,
  method: ((...args: A) => R) | undefined
): ((...args: A) => R) | undefined {
  if (typeof method !== "function") {
    return undefined;
  }
  return (...args: A) => method.apply(plugin, args);
}

/**
 * True when `plugin` exposes `callback` as a function
 */
export function implementsCallback(plugin: object, callback: string): boolean {
  return typeof Reflect.get(plugin, callback) === "function";
}

/**
 * Reject with PluginTimeoutError once `limitMs` elapses, unless `signal` aborts first
 */
async function expire(callback: string, limitMs: number, signal: AbortSignal): Promise<never> {
  await delay(limitMs, undefined, { signal });
  throw new PluginTimeoutError(callback, limitMs);
}

/**
 * Run one plugin callback and capture its outcome. Never throws.
 *
 * With `limitMs`, a callback that has not settled in time is abandoned and
 * counts as failed with a PluginTimeoutError. Missing and failed outcomes are
 * logged as warnings naming the plugin and the callback; the caller decides
 * whether either is fatal.
 */
export async function contain<T>(
  subject: PluginSubject,
  callback: string,
  invoke: (() => MaybePromise<T>) | undefined,
  log: Logger,
  limitMs?: number
): Promise<ContainedOutcome<T>> {
  if (invoke === undefined) {
    log.warn(`The ${subject.kind} "${subject.name}" does not implement ${callback}()`);
    return { status: "missing" };
  }

  const timer = new AbortController();
  try {
    const pending = Promise.resolve(invoke());
    const value =
      limitMs === undefined
        ? await pending
        : await Promise.race([pending, expire(callback, limitMs, timer.signal)]);
    return { status: "ok", value };
  } catch (error) {
    if (error instanceof PluginTimeoutError) {
      log.warn(`The ${subject.kind} "${subject.name}" ${callback} function did not complete within ${error.limitMs} ms`);
    } else {
      log.warn(
        `The ${subject.kind} "${subject.name}" ${callback} function raised an exception: ${errorMessage(error)}`
      );
    }
    return { status: "failed", error };
  } finally {
    timer.abort();
  }
}
