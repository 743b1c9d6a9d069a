/**
 * Program Resolvers
 *
 * Builds the lazy program-path functions stored on launch configurations.
 */

import { existsSync } from 'fs';
import { ProgramResolver } from './types.js';
import { ResolutionError } from './errors.js';

/** Token replaced by the current working directory at resolve time */
export const CWD_TOKEN = '${cwd}';

export interface ResolverOptions {
  /** Reads the current working directory (default: process.cwd) */
  cwd?: () => string;
  /** Require the resolved program to exist on disk (default: true) */
  mustExist?: boolean;
}

/**
 * Read the current working directory, failing with a ResolutionError when
 * it is gone
 */
export function currentWorkingDirectory(read: () => string = () => process.cwd()): string {
  try {
    return read();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ResolutionError(
      `Cannot determine the current working directory: ${message}`,
      { cause: error }
    );
  }
}

/**
 * Create a resolver that expands ${cwd} in a path template each time it is
 * called. Other ${...} tokens are left as they are.
 */
export function programFromTemplate(
  template: string,
  options: ResolverOptions = {}
): ProgramResolver {
  const { cwd, mustExist = true } = options;

  return () => {
    let program = template;
    if (template.includes(CWD_TOKEN)) {
      const dir = currentWorkingDirectory(cwd);
      // function form: '$' sequences in the directory stay literal
      program = template.replaceAll(CWD_TOKEN, () => dir);
    }

    if (mustExist && !existsSync(program)) {
      throw new ResolutionError(`Program not found: ${program}`);
    }

    return program;
  };
}
