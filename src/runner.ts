import { spawn } from 'child_process';
import { CommandTimeoutError, ToolUnavailableError } from './errors';
import { CommandRunner, RunResult } from './types';

export interface ProcessRunnerOptions {
  timeoutMs?: number;
  debug?: (message: string) => void;
}

/**
 * Runs an argv without a shell and resolves with its exit code and decoded
 * output. Rejects with {@link ToolUnavailableError} when the executable cannot
 * be started and with {@link CommandTimeoutError} when the timeout kills it.
 */
export function createProcessRunner(options: ProcessRunnerOptions = {}): CommandRunner {
  const { timeoutMs, debug } = options;

  return (argv: string[]) =>
    new Promise<RunResult>((resolve, reject) => {
      const [command, ...args] = argv;
      if (!command) {
        reject(new Error('Cannot run an empty command line'));
        return;
      }
      const commandLine = argv.join(' ');
      debug?.(`Executing: ${commandLine}`);

      const child = spawn(command, args, { windowsHide: true });
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const timer =
        timeoutMs && timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              child.kill();
            }, timeoutMs)
          : null;

      child.stdin.end();
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => (stdout += chunk));
      child.stderr.on('data', (chunk: string) => (stderr += chunk));

      child.on('error', (err: NodeJS.ErrnoException) => {
        if (timer) clearTimeout(timer);
        if (err.code === 'ENOENT' || err.code === 'EACCES') {
          reject(new ToolUnavailableError(command, err.message));
        } else {
          reject(err);
        }
      });

      child.on('close', (code: number | null) => {
        if (timer) clearTimeout(timer);
        if (timedOut && timeoutMs) {
          reject(new CommandTimeoutError(commandLine, timeoutMs));
          return;
        }
        const exitCode = code ?? 1;
        debug?.(`${command} returned code: ${exitCode}`);
        resolve({ exitCode, stdout, stderr });
      });
    });
}
