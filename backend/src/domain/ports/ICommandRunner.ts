/**
 * Port for running external commands
 * Infrastructure provides the adapter implementation
 */

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecuteOptions {
  cwd?: string;
  /** Written to the child's stdin, which is then closed */
  input?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ICommandRunner {
  /**
   * Execute a command and return the result
   */
  execute(command: string, args: string[], options?: ExecuteOptions): Promise<CommandResult>;
}

export const COMMAND_RUNNER = Symbol('ICommandRunner');
