/**
 * Registers launch profiles with the debug host, if the host can be loaded.
 */

import { AdapterDescriptor, LaunchConfig } from '../adapters/types.js';
import { CapabilityProbe } from '../host/capability.js';
import { log, Reporter } from '../logging.js';
import { LaunchProfiles } from './profile-loader.js';

/**
 * The part of a debug host that accepts registrations
 */
export interface LaunchHost {
  registerAdapter(name: string, descriptor: AdapterDescriptor): void;
  registerLaunchConfigs(language: string, configs: readonly LaunchConfig[]): void;
}

/**
 * Probe for the host and register every adapter and language. When the
 * probe fails nothing is registered and the failure is only reported.
 *
 * The standalone server hands in its own registry, so its probe always
 * succeeds; the guard is for hosts that embed these profiles and load their
 * debug framework lazily.
 *
 * @returns whether the profiles were registered
 */
export function setupLaunchProfiles(
  probe: CapabilityProbe<LaunchHost>,
  profiles: LaunchProfiles,
  report: Reporter = log
): boolean {
  const capability = probe();
  if (!capability.ok) {
    report(capability.error.message);
    return false;
  }

  const host = capability.module;
  for (const [name, descriptor] of profiles.adapters) {
    host.registerAdapter(name, descriptor);
  }
  for (const [language, configs] of profiles.configurations) {
    host.registerLaunchConfigs(language, configs);
  }

  return true;
}
