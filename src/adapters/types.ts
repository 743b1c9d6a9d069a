/**
 * Adapter Types
 *
 * Descriptors for debug adapters and the language-scoped launch
 * configurations that reference them.
 */

/**
 * How the launcher reaches an adapter: by spawning it, or by connecting to
 * one that is already listening
 */
export type AdapterKind = 'executable' | 'server';

/**
 * Debug Adapter Protocol request used to start a session
 */
export type RequestKind = 'launch' | 'attach';

/**
 * Describes how to start a debug adapter
 */
export interface AdapterDescriptor {
  readonly kind: AdapterKind;
  /** Path to the adapter executable */
  readonly command: string;
  /** Human-readable name of the adapter */
  readonly displayName: string;
  /** Arguments passed to the adapter command */
  readonly args?: readonly string[];
}

/**
 * Computes a program path on demand. Called at launch time, never at
 * registration time.
 */
export type ProgramResolver = () => string;

/**
 * A named template describing how to start a debug session
 */
export interface LaunchConfig {
  readonly name: string;
  /** Key of the adapter in the registry; checked when the config is used */
  readonly adapterName: string;
  readonly requestKind: RequestKind;
  readonly programResolver: ProgramResolver;
  /** May hold placeholders such as ${workspaceFolder}, expanded by the launcher */
  readonly workingDirectory: string;
  readonly stopOnEntry: boolean;
  /** Arguments for the debugged program */
  readonly args?: readonly string[];
}
