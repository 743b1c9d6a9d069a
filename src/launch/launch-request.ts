/**
 * Launch Request Builder
 *
 * Turns a registered launch configuration into Debug Adapter Protocol
 * launch/attach arguments for the launcher to send.
 */

import { DebugProtocol } from '@vscode/debugprotocol';
import { AdapterRegistry } from '../adapters/adapter-registry.js';
import { AdapterDescriptor, LaunchConfig } from '../adapters/types.js';

interface SessionFields {
  type: string;
  name: string;
  program: string;
  /** Left unexpanded; placeholders belong to the launcher */
  cwd: string;
  stopOnEntry: boolean;
  args?: string[];
}

export interface LaunchArguments extends DebugProtocol.LaunchRequestArguments, SessionFields {
  request: 'launch';
}

export interface AttachArguments extends DebugProtocol.AttachRequestArguments, SessionFields {
  request: 'attach';
}

export type LaunchRequestArguments = LaunchArguments | AttachArguments;

export interface ResolvedLaunch {
  adapterName: string;
  adapter: AdapterDescriptor;
  arguments: LaunchRequestArguments;
}

/**
 * Build the request for a configuration. The adapter must be registered by
 * now; the program path is computed at this point.
 */
export function buildLaunchRequest(
  registry: AdapterRegistry,
  config: LaunchConfig
): ResolvedLaunch {
  const adapter = registry.getAdapter(config.adapterName);
  if (!adapter) {
    throw new Error(
      `Adapter '${config.adapterName}' used by '${config.name}' is not registered`
    );
  }

  const fields: SessionFields = {
    type: config.adapterName,
    name: config.name,
    program: registry.resolveProgramPath(config),
    cwd: config.workingDirectory,
    stopOnEntry: config.stopOnEntry,
    ...(config.args ? { args: [...config.args] } : {})
  };

  return {
    adapterName: config.adapterName,
    adapter,
    arguments:
      config.requestKind === 'attach'
        ? { request: 'attach', ...fields }
        : { request: 'launch', ...fields }
  };
}

/**
 * Look up a configuration by language and name, then build its request
 */
export function resolveLaunch(
  registry: AdapterRegistry,
  language: string,
  name: string
): ResolvedLaunch {
  const config = registry.findLaunchConfig(language, name);
  if (!config) {
    throw new Error(`No launch configuration '${name}' for language '${language}'`);
  }
  return buildLaunchRequest(registry, config);
}
