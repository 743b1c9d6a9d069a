/**
 * MCP Registry Server
 *
 * Exposes registered debug adapters and launch configurations as MCP tools
 * for debug launchers.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { AdapterRegistry, LaunchConfig } from './adapters/index.js';
import { probeCapability } from './host/capability.js';
import { loadLaunchProfiles } from './profiles/profile-loader.js';
import { setupLaunchProfiles } from './profiles/setup.js';
import { resolveLaunch } from './launch/launch-request.js';
import { loadServerConfig } from './config.js';
import { log } from './logging.js';

/**
 * Tool definitions
 */
const tools: Tool[] = [
  {
    name: 'list_adapters',
    description: 'List all registered debug adapters',
    inputSchema: {
      type: 'object',
      properties: {}
    }
  },
  {
    name: 'get_adapter',
    description: 'Get the launch descriptor of a debug adapter',
    inputSchema: {
      type: 'object',
      properties: {
        name: {
          type: 'string',
          description: 'Adapter name (e.g., lldb)'
        }
      },
      required: ['name']
    }
  },
  {
    name: 'list_languages',
    description: 'List languages that have launch configurations',
    inputSchema: {
      type: 'object',
      properties: {}
    }
  },
  {
    name: 'get_launch_configs',
    description:
      'Get the launch configurations for a language, in display order. Pass either a language or a source file to detect it from.',
    inputSchema: {
      type: 'object',
      properties: {
        language: {
          type: 'string',
          description: 'Language name (e.g., rust)'
        },
        file: {
          type: 'string',
          description: 'Source file whose extension selects the language'
        }
      }
    }
  },
  {
    name: 'resolve_launch_config',
    description:
      'Resolve a launch configuration into Debug Adapter Protocol request arguments. The program path is computed at call time.',
    inputSchema: {
      type: 'object',
      properties: {
        language: {
          type: 'string',
          description: 'Language name'
        },
        name: {
          type: 'string',
          description: 'Launch configuration name'
        }
      },
      required: ['language', 'name']
    }
  }
];

const getAdapterArgs = z.object({ name: z.string().min(1) });

const getLaunchConfigsArgs = z
  .object({
    language: z.string().min(1).optional(),
    file: z.string().min(1).optional()
  })
  .refine((args) => args.language !== undefined || args.file !== undefined, {
    message: 'Either language or file is required'
  });

const resolveLaunchConfigArgs = z.object({
  language: z.string().min(1),
  name: z.string().min(1)
});

function describeConfig(config: LaunchConfig) {
  return {
    name: config.name,
    adapter: config.adapterName,
    request: config.requestKind,
    cwd: config.workingDirectory,
    stopOnEntry: config.stopOnEntry
  };
}

/**
 * Handle a tool call
 */
export function handleToolCall(
  registry: AdapterRegistry,
  name: string,
  args: Record<string, unknown>
): unknown {
  switch (name) {
    case 'list_adapters': {
      const adapters = registry.listAdapters().flatMap((adapterName) => {
        const descriptor = registry.getAdapter(adapterName);
        return descriptor ? [{ name: adapterName, ...descriptor }] : [];
      });
      return { adapters };
    }

    case 'get_adapter': {
      const { name: adapterName } = getAdapterArgs.parse(args);
      const descriptor = registry.getAdapter(adapterName);
      if (!descriptor) {
        throw new Error(`Adapter '${adapterName}' is not registered`);
      }
      return { name: adapterName, ...descriptor };
    }

    case 'list_languages': {
      return { languages: registry.getLanguages() };
    }

    case 'get_launch_configs': {
      const { language, file } = getLaunchConfigsArgs.parse(args);
      const resolvedLanguage = language ?? (file ? registry.detectLanguage(file) : null);
      const configs = resolvedLanguage ? registry.getLaunchConfigs(resolvedLanguage) : [];
      return {
        language: resolvedLanguage,
        configs: configs.map(describeConfig)
      };
    }

    case 'resolve_launch_config': {
      const { language, name: configName } = resolveLaunchConfigArgs.parse(args);
      const resolved = resolveLaunch(registry, language, configName);
      return {
        adapter: { name: resolved.adapterName, ...resolved.adapter },
        arguments: resolved.arguments
      };
    }

    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}

/**
 * Create and configure the MCP server
 */
export function createServer(registry: AdapterRegistry): Server {
  const server = new Server(
    {
      name: 'dap-launch-registry',
      version: '1.0.0'
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  // List tools handler
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools
  }));

  // Call tool handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const result = handleToolCall(registry, name, args ?? {});
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2)
          }
        ]
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({ error: message }, null, 2)
          }
        ],
        isError: true
      };
    }
  });

  return server;
}

/**
 * Load the configured profiles and start the MCP server on stdio
 */
export async function startServer(): Promise<void> {
  const config = loadServerConfig();
  const profiles = await loadLaunchProfiles(config.profilesPath);

  const registry = new AdapterRegistry();
  const registered = setupLaunchProfiles(
    () => probeCapability('adapter registry', () => registry),
    profiles
  );
  if (registered) {
    log(
      `Registered ${profiles.adapters.size} adapter(s) and ${profiles.configurations.size} language(s) from ${config.profilesPath}`
    );
  }

  const server = createServer(registry);
  const transport = new StdioServerTransport();

  // Handle shutdown
  process.on('SIGINT', () => {
    void server.close().finally(() => process.exit(0));
  });

  process.on('SIGTERM', () => {
    void server.close().finally(() => process.exit(0));
  });

  await server.connect(transport);
}
