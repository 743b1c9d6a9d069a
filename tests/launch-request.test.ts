import { describe, it, expect, vi } from 'vitest';
import { AdapterRegistry, LaunchConfig, ResolutionError } from '../src/adapters/index.js';
import {
  LaunchArguments,
  buildLaunchRequest,
  resolveLaunch
} from '../src/launch/launch-request.js';

function makeRegistry(configs: LaunchConfig[]): AdapterRegistry {
  const registry = new AdapterRegistry();
  registry.registerAdapter('lldb', {
    kind: 'executable',
    command: '/usr/bin/lldb-vscode',
    displayName: 'lldb'
  });
  registry.registerLaunchConfigs('rust', configs);
  return registry;
}

const vulkanTest: LaunchConfig = {
  name: 'vulkan-test',
  adapterName: 'lldb',
  requestKind: 'launch',
  programResolver: () => '/home/dev/vulkan/target/debug/vulkan-test',
  workingDirectory: '${workspaceFolder}',
  stopOnEntry: false
};

describe('buildLaunchRequest', () => {
  it('builds launch arguments with the resolved program', () => {
    const registry = makeRegistry([vulkanTest]);

    expect(buildLaunchRequest(registry, vulkanTest)).toEqual({
      adapterName: 'lldb',
      adapter: {
        kind: 'executable',
        command: '/usr/bin/lldb-vscode',
        displayName: 'lldb'
      },
      arguments: {
        type: 'lldb',
        request: 'launch',
        name: 'vulkan-test',
        program: '/home/dev/vulkan/target/debug/vulkan-test',
        cwd: '${workspaceFolder}',
        stopOnEntry: false
      }
    });
  });

  it('copies program arguments and attach requests', () => {
    const config: LaunchConfig = {
      ...vulkanTest,
      name: 'attach-renderer',
      requestKind: 'attach',
      stopOnEntry: true,
      args: ['--validation']
    };
    const registry = makeRegistry([config]);

    const { arguments: request } = buildLaunchRequest(registry, config);
    expect(request).toEqual({
      request: 'attach',
      type: 'lldb',
      name: 'attach-renderer',
      program: '/home/dev/vulkan/target/debug/vulkan-test',
      cwd: '${workspaceFolder}',
      stopOnEntry: true,
      args: ['--validation']
    });
  });

  it('tags the arguments with the request kind', () => {
    const registry = makeRegistry([vulkanTest]);
    const { arguments: request } = buildLaunchRequest(registry, vulkanTest);

    if (request.request !== 'launch') {
      throw new Error(`Expected a launch request, got ${request.request}`);
    }
    const launch: LaunchArguments = request;
    expect(launch.request).toBe('launch');
    expect(launch.noDebug).toBeUndefined();
  });

  it('fails before resolving when the adapter is not registered', () => {
    const programResolver = vi.fn(() => '/work/app');
    const config: LaunchConfig = { ...vulkanTest, adapterName: 'gdb', programResolver };
    const registry = makeRegistry([config]);

    expect(() => buildLaunchRequest(registry, config)).toThrow(
      "Adapter 'gdb' used by 'vulkan-test' is not registered"
    );
    expect(programResolver).not.toHaveBeenCalled();
  });

  it('propagates resolution failures', () => {
    const config: LaunchConfig = {
      ...vulkanTest,
      programResolver: () => {
        throw new ResolutionError('Program not found: /work/target/debug/vulkan-test');
      }
    };
    const registry = makeRegistry([config]);

    expect(() => buildLaunchRequest(registry, config)).toThrow(ResolutionError);
  });
});

describe('resolveLaunch', () => {
  it('looks up the config by language and name', () => {
    const registry = makeRegistry([vulkanTest]);
    expect(resolveLaunch(registry, 'rust', 'vulkan-test').arguments.program).toBe(
      '/home/dev/vulkan/target/debug/vulkan-test'
    );
  });

  it('fails for an unknown config', () => {
    const registry = makeRegistry([vulkanTest]);
    expect(() => resolveLaunch(registry, 'rust', 'missing')).toThrow(
      "No launch configuration 'missing' for language 'rust'"
    );
  });
});
