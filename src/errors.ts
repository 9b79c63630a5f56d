import { RunResult } from './types';

export class ToolUnavailableError extends Error {
  constructor(
    readonly command: string,
    detail?: string,
  ) {
    super(`Unable to run '${command}'${detail ? `: ${detail}` : ''}`);
    this.name = 'ToolUnavailableError';
  }
}

export class CommandTimeoutError extends Error {
  constructor(
    readonly commandLine: string,
    readonly timeoutMs: number,
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${commandLine}`);
    this.name = 'CommandTimeoutError';
  }
}

export class InvalidPackageIdError extends Error {
  constructor(readonly packageId: string) {
    super(`Invalid package id: ${JSON.stringify(packageId.slice(0, 80))}`);
    this.name = 'InvalidPackageIdError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Text to show for a failed invocation. winget reports most failures on
 * stdout, so stdout is used when stderr is empty.
 */
export function failureText(result: RunResult): string {
  const text = result.stderr.trim() || result.stdout.trim();
  return text || `exit code ${result.exitCode}`;
}
