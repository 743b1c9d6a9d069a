/**
 * Launch Profile Loader
 *
 * Reads a JSON launch-profile file and turns it into adapter descriptors and
 * launch configurations with lazy program resolvers.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { AdapterDescriptor, LaunchConfig } from '../adapters/types.js';
import { ProfileValidationError } from '../adapters/errors.js';
import { programFromTemplate, ResolverOptions } from '../adapters/program-resolver.js';

const WORKSPACE_FOLDER = '${workspaceFolder}';

const adapterSchema = z.object({
  type: z.enum(['executable', 'server']),
  command: z.string().min(1),
  name: z.string().min(1).optional(),
  args: z.array(z.string()).optional()
});

const launchConfigSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  request: z.enum(['launch', 'attach']),
  program: z.string().min(1),
  cwd: z.string().default(WORKSPACE_FOLDER),
  stopOnEntry: z.boolean().default(false),
  args: z.array(z.string()).optional(),
  mustExist: z.boolean().default(true)
});

const profileFileSchema = z.object({
  adapters: z.record(adapterSchema).default({}),
  configurations: z.record(z.array(launchConfigSchema)).default({})
});

export type ProfileFile = z.input<typeof profileFileSchema>;

/**
 * Adapters and per-language launch configurations ready for registration
 */
export interface LaunchProfiles {
  adapters: Map<string, AdapterDescriptor>;
  configurations: Map<string, LaunchConfig[]>;
}

/**
 * Validate parsed profile JSON and build the registration tables
 */
export function parseLaunchProfiles(
  raw: unknown,
  source: string,
  resolverOptions: Pick<ResolverOptions, 'cwd'> = {}
): LaunchProfiles {
  const result = profileFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ProfileValidationError(
      source,
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      )
    );
  }

  const adapters = new Map<string, AdapterDescriptor>();
  for (const [name, adapter] of Object.entries(result.data.adapters)) {
    adapters.set(name, {
      kind: adapter.type,
      command: adapter.command,
      displayName: adapter.name ?? name,
      ...(adapter.args ? { args: adapter.args } : {})
    });
  }

  const configurations = new Map<string, LaunchConfig[]>();
  for (const [language, entries] of Object.entries(result.data.configurations)) {
    configurations.set(
      language,
      entries.map((entry) => ({
        name: entry.name,
        adapterName: entry.type,
        requestKind: entry.request,
        programResolver: programFromTemplate(entry.program, {
          ...resolverOptions,
          mustExist: entry.mustExist
        }),
        workingDirectory: entry.cwd,
        stopOnEntry: entry.stopOnEntry,
        ...(entry.args ? { args: entry.args } : {})
      }))
    );
  }

  return { adapters, configurations };
}

/**
 * Read and validate a launch-profile file
 */
export async function loadLaunchProfiles(filePath: string): Promise<LaunchProfiles> {
  const content = await fs.readFile(filePath, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ProfileValidationError(filePath, [`(root): invalid JSON: ${message}`]);
  }

  return parseLaunchProfiles(raw, filePath);
}
