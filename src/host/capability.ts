/**
 * Capability Probe
 *
 * Loads an optional host framework and reports the outcome as a value, so
 * callers can bail out early instead of catching.
 */

import { CapabilityUnavailableError } from '../adapters/errors.js';

export type Capability<T> =
  | { ok: true; module: T }
  | { ok: false; error: CapabilityUnavailableError };

export type CapabilityProbe<T> = () => Capability<T>;

/**
 * Run a loader and capture whether it produced the host module
 */
export function probeCapability<T>(name: string, load: () => T): Capability<T> {
  try {
    return { ok: true, module: load() };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      error: new CapabilityUnavailableError(`Failed to load ${name}: ${message}`, {
        cause: error
      })
    };
  }
}
