/**
 * Adapter Registry
 *
 * Central registry for debug adapters and launch configurations. Maps adapter
 * names to descriptors, languages to ordered launch configurations, and
 * provides language detection from file extensions.
 */

import * as path from 'path';
import { AdapterDescriptor, LaunchConfig } from './types.js';
import { ResolutionError } from './errors.js';

/**
 * Registry for debug adapters and their launch configurations
 */
export class AdapterRegistry {
  private adapters: Map<string, AdapterDescriptor> = new Map();
  private configurations: Map<string, readonly LaunchConfig[]> = new Map();
  private extensionMap: Map<string, string> = new Map();

  constructor() {
    this.initializeExtensionMap();
  }

  /**
   * Initialize the file extension to language mapping
   */
  private initializeExtensionMap(): void {
    const languages: Record<string, string[]> = {
      rust: ['.rs'],
      c: ['.c', '.h'],
      cpp: ['.cpp', '.cc', '.cxx', '.hpp', '.hh'],
      go: ['.go'],
      python: ['.py'],
      javascript: ['.js', '.mjs', '.cjs'],
      typescript: ['.ts', '.mts', '.cts'],
      zig: ['.zig'],
      swift: ['.swift']
    };

    for (const [language, extensions] of Object.entries(languages)) {
      for (const ext of extensions) {
        this.extensionMap.set(ext, language);
      }
    }
  }

  /**
   * Register an adapter under a name. A later registration under the same
   * name replaces the earlier one.
   */
  registerAdapter(name: string, descriptor: AdapterDescriptor): void {
    const stored: AdapterDescriptor = descriptor.args
      ? { ...descriptor, args: Object.freeze([...descriptor.args]) }
      : { ...descriptor };
    this.adapters.set(name, Object.freeze(stored));
  }

  /**
   * Register the launch configurations for a language, replacing any
   * previously registered list
   */
  registerLaunchConfigs(language: string, configs: readonly LaunchConfig[]): void {
    this.configurations.set(language, Object.freeze([...configs]));
  }

  /**
   * Look up an adapter by name
   */
  getAdapter(name: string): AdapterDescriptor | undefined {
    return this.adapters.get(name);
  }

  /**
   * Get the launch configurations for a language, in registration order
   */
  getLaunchConfigs(language: string): readonly LaunchConfig[] {
    return this.configurations.get(language) ?? [];
  }

  /**
   * Find a single launch configuration by name
   */
  findLaunchConfig(language: string, name: string): LaunchConfig | undefined {
    return this.getLaunchConfigs(language).find((config) => config.name === name);
  }

  /**
   * Get all registered adapter names
   */
  listAdapters(): string[] {
    return Array.from(this.adapters.keys());
  }

  /**
   * Get all languages with registered launch configurations
   */
  getLanguages(): string[] {
    return Array.from(this.configurations.keys());
  }

  /**
   * Compute the program path of a configuration now
   */
  resolveProgramPath(config: LaunchConfig): string {
    try {
      return config.programResolver();
    } catch (error) {
      if (error instanceof ResolutionError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ResolutionError(
        `Failed to resolve program for '${config.name}': ${message}`,
        { cause: error }
      );
    }
  }

  /**
   * Detect language from file extension
   */
  detectLanguage(filePath: string): string | null {
    const ext = path.extname(filePath).toLowerCase();
    return this.extensionMap.get(ext) ?? null;
  }
}
