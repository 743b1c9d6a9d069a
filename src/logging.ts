/**
 * Diagnostics go to stderr; stdout carries the MCP transport.
 */

const PREFIX = '[dap-registry]';

export type Reporter = (message: string) => void;

export function log(message: string): void {
  process.stderr.write(`${PREFIX} ${message}\n`);
}
