import { spawn } from 'child_process';
import { CommandResult, ExecuteOptions, ICommandRunner } from '../../domain/ports/ICommandRunner';

export const DEFAULT_COMMAND_TIMEOUT_MS = 300000;

/**
 * Service for running external commands such as AI CLIs.
 * Implements ICommandRunner port from domain
 */
export class CommandRunner implements ICommandRunner {
  /**
   * Execute a command and return the result
   */
  execute(command: string, args: string[], options: ExecuteOptions = {}): Promise<CommandResult> {
    const { cwd, input, timeoutMs = DEFAULT_COMMAND_TIMEOUT_MS, signal } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error(`Command aborted before start: ${command}`));
        return;
      }

      // No shell: arguments carry untrusted repository content
      const proc = spawn(command, args, {
        cwd,
        env: {
          ...process.env,
          // Disable interactive mode for CI environments
          CI: 'true',
          // Force color output off to avoid parsing issues
          FORCE_COLOR: '0',
        },
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (action: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
        action();
      };

      const onAbort = (): void => {
        proc.kill('SIGTERM');
        finish(() => reject(new Error(`Command aborted: ${command}`)));
      };

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      const timeout = setTimeout(() => {
        proc.kill('SIGTERM');
        finish(() => reject(new Error(`Command timed out after ${timeoutMs}ms`)));
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });

      proc.on('close', (code) => {
        finish(() =>
          resolve({
            stdout,
            stderr,
            exitCode: code ?? 1,
          }),
        );
      });

      proc.on('error', (err) => {
        finish(() => reject(err));
      });

      // A child that exits without reading stdin raises EPIPE here; its exit code still reports the failure
      proc.stdin.on('error', (err) => {
        stderr += `stdin: ${err.message}\n`;
      });
      if (input !== undefined) {
        proc.stdin.write(input);
      }
      proc.stdin.end();
    });
  }
}
