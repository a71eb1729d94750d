import { execFile } from 'child_process';

export interface CLIExecutionOptions {
  /** Milliseconds; 0 waits forever. */
  timeout?: number;
  cwd?: string;
  /** Merged over process.env. */
  env?: Record<string, string>;
  maxBuffer?: number;
}

export interface CLIExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
}

export class CLIExecutionError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly stdout: string,
    public readonly stderr: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'CLIExecutionError';
  }
}

/**
 * Runs an external tool. Arguments are passed as a list, never through a shell.
 */
export type CommandRunner = (command: string, args: string[], options?: CLIExecutionOptions) => Promise<CLIExecutionResult>;

export class CLIExecutor {
  /**
   * Execute a command and return the result
   * @throws CLIExecutionError if the command fails or times out
   */
  static execute(command: string, args: string[], options: CLIExecutionOptions = {}): Promise<CLIExecutionResult> {
    const startTime = Date.now();
    const {
      timeout = 0,
      cwd = process.cwd(),
      env = {},
      maxBuffer = 10 * 1024 * 1024,
    } = options;
    const display = [command, ...args].join(' ');

    return new Promise((resolve, reject) => {
      execFile(command, args, { timeout, cwd, env: { ...process.env, ...env }, maxBuffer }, (error, stdout, stderr) => {
        const out = String(stdout).trim();
        const err = String(stderr).trim();

        if (!error) {
          resolve({ stdout: out, stderr: err, exitCode: 0, durationMs: Date.now() - startTime });
          return;
        }

        if (error.killed && error.signal === 'SIGTERM') {
          reject(new CLIExecutionError(`Command timed out after ${timeout}ms`, display, out, err, -1));
          return;
        }

        if (error.code === 'ENOENT') {
          reject(new CLIExecutionError(`Command not found: ${command}`, display, out, err, 127));
          return;
        }

        const exitCode = typeof error.code === 'number' ? error.code : 1;
        reject(new CLIExecutionError(`Command failed with exit code ${exitCode}: ${error.message}`, display, out, err, exitCode));
      });
    });
  }

  /**
   * Check if a CLI tool is installed and accessible
   */
  static async isInstalled(toolName: string): Promise<boolean> {
    try {
      await this.execute('which', [toolName], { timeout: 5000 });
      return true;
    } catch {
      return false;
    }
  }
}

export const runCommand: CommandRunner = (command, args, options) => CLIExecutor.execute(command, args, options);
