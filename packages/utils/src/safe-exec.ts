import { spawn, spawnSync, type SpawnSyncOptions } from 'node:child_process';

import which from 'which';

/**
 * Options for safe command execution
 */
export interface SafeExecOptions {
  /** Character encoding for output (default: undefined = Buffer) */
  encoding?: BufferEncoding;
  /** Standard I/O configuration */
  stdio?: 'pipe' | 'ignore' | Array<'pipe' | 'ignore' | 'inherit'>;
  /** Environment variables (merged with process.env if not fully specified) */
  env?: NodeJS.ProcessEnv;
  /** Working directory */
  cwd?: string;
  /** Maximum output buffer size in bytes */
  maxBuffer?: number;
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * Result of a safe command execution
 */
export interface SafeExecResult {
  /** Exit code (0 = success) */
  status: number;
  /** Standard output */
  stdout: Buffer | string;
  /** Standard error */
  stderr: Buffer | string;
  /** Error object if command failed to spawn */
  error?: Error;
}

/**
 * Error thrown when command execution fails
 */
export class CommandExecutionError extends Error {
  public readonly status: number;
  public readonly stdout: Buffer | string;
  public readonly stderr: Buffer | string;

  constructor(
    message: string,
    status: number,
    stdout: Buffer | string,
    stderr: Buffer | string,
  ) {
    super(message);
    this.name = 'CommandExecutionError';
    this.status = status;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/**
 * Error thrown when a command cannot be located on PATH (or at the given path)
 */
export class CommandNotFoundError extends Error {
  public readonly command: string;

  constructor(command: string) {
    super(`Command not found: ${command}`);
    this.name = 'CommandNotFoundError';
    this.command = command;
  }
}

/**
 * Determine if shell should be used for command execution on Windows
 *
 * Windows requires shell:true for .cmd/.bat/.ps1 scripts. Paths are
 * resolved by which before execution, so no user string reaches the shell
 * unvalidated.
 */
function shouldUseShell(commandPath: string): boolean {
  if (process.platform !== 'win32') {
    return false;
  }

  const lowerPath = commandPath.toLowerCase();
  return lowerPath.endsWith('.cmd') || lowerPath.endsWith('.bat') || lowerPath.endsWith('.ps1');
}

/**
 * Resolve a command to an absolute executable path
 *
 * Accepts bare names (looked up on PATH) and explicit paths such as
 * `/usr/bin/kicad-cli` or `C:\Program Files\KiCad\9.0\bin\kicad-cli.exe`.
 *
 * @returns Absolute path, or null when the command cannot be found
 */
export function resolveCommand(command: string): string | null {
  return which.sync(command, { nothrow: true });
}

/**
 * Safe command execution using spawnSync + which pattern
 *
 * - Resolves PATH once using pure Node.js (which package)
 * - Executes with absolute path and shell: false
 *
 * @param command - Command name (e.g., 'git', 'wslpath')
 * @param args - Array of arguments
 * @param options - Execution options
 * @returns Buffer or string output
 * @throws CommandNotFoundError if the command is not installed
 * @throws CommandExecutionError on non-zero exit
 *
 * @example
 * const version = safeExecSync('kicad-cli', ['version'], { encoding: 'utf8' });
 */
export function safeExecSync(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): Buffer | string {
  const commandPath = resolveCommand(command);
  if (commandPath === null) {
    throw new CommandNotFoundError(command);
  }

  const useShell = shouldUseShell(commandPath);

  const spawnOptions: SpawnSyncOptions = {
    shell: useShell,
    stdio: options.stdio ?? 'pipe',
    env: options.env,
    cwd: options.cwd,
    maxBuffer: options.maxBuffer,
    timeout: options.timeout,
    encoding: options.encoding,
  };

  const result = spawnSync(commandPath, args, spawnOptions);

  if (result.error) {
    throw result.error;
  }

  if (result.status !== 0) {
    throw new CommandExecutionError(
      `Command failed with exit code ${result.status ?? 'unknown'}: ${command} ${args.join(' ')}`,
      result.status ?? -1,
      result.stdout,
      result.stderr,
    );
  }

  return result.stdout;
}

/**
 * Safe command execution that returns detailed result (doesn't throw)
 *
 * @example
 * const result = safeExecResult('git', ['status']);
 * if (result.status !== 0) {
 *   console.error(result.stderr.toString());
 * }
 */
export function safeExecResult(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): SafeExecResult {
  const commandPath = resolveCommand(command);
  if (commandPath === null) {
    return {
      status: -1,
      stdout: Buffer.from(''),
      stderr: Buffer.from(''),
      error: new CommandNotFoundError(command),
    };
  }

  const result = spawnSync(commandPath, args, {
    shell: shouldUseShell(commandPath),
    stdio: options.stdio ?? 'pipe',
    env: options.env,
    cwd: options.cwd,
    maxBuffer: options.maxBuffer,
    timeout: options.timeout,
    encoding: options.encoding,
  });

  return {
    status: result.status ?? -1,
    stdout: result.stdout ?? Buffer.from(''),
    stderr: result.stderr ?? Buffer.from(''),
    error: result.error,
  };
}

/**
 * Get tool version if available
 *
 * @param toolName - Name of tool (e.g., 'git', 'kicad-cli')
 * @param versionArg - Argument to get version (default: '--version')
 * @returns Version string or null if not available
 *
 * @example
 * getToolVersion('kicad-cli', 'version'); // "9.0.1"
 */
export function getToolVersion(
  toolName: string,
  versionArg: string = '--version',
): string | null {
  const result = safeExecResult(toolName, [versionArg], { encoding: 'utf8' });
  if (result.error || result.status !== 0) {
    return null;
  }
  return result.stdout.toString().trim();
}

/**
 * Options for asynchronous command execution
 */
export interface RunCommandOptions {
  /** Working directory */
  cwd?: string;
  /** Environment variables (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Kill the process after this many milliseconds */
  timeout?: number;
  /** Kill the process when this signal aborts */
  signal?: AbortSignal;
}

/**
 * Result of an asynchronous command execution
 */
export interface RunCommandResult {
  /** Exit code (-1 when killed by a signal) */
  status: number;
  stdout: Buffer;
  stderr: Buffer;
  /** True when the process was killed because `timeout` elapsed */
  timedOut: boolean;
  /** True when the process was killed because `signal` aborted */
  aborted: boolean;
}

/**
 * Run a command asynchronously without a shell
 *
 * Unlike {@link safeExecSync}, the event loop stays free while the child
 * runs, so slow tools (git over large histories, renderers) can run in
 * parallel. Non-zero exits resolve normally; inspect `status`.
 *
 * @throws CommandNotFoundError if the command cannot be located
 * @throws the spawn error (e.g. EACCES) if the process cannot be started
 *
 * @example
 * const result = await runCommand('git', ['cat-file', 'blob', 'HEAD:board.kicad_pcb'], { cwd });
 * if (result.status === 0) {
 *   await writeFile(dest, result.stdout);
 * }
 */
export function runCommand(
  command: string,
  args: string[] = [],
  options: RunCommandOptions = {},
): Promise<RunCommandResult> {
  const commandPath = resolveCommand(command);
  if (commandPath === null) {
    return Promise.reject(new CommandNotFoundError(command));
  }

  return new Promise<RunCommandResult>((resolve, reject) => {
    const proc = spawn(commandPath, args, {
      shell: shouldUseShell(commandPath),
      stdio: ['ignore', 'pipe', 'pipe'],
      cwd: options.cwd,
      env: options.env ?? process.env,
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let aborted = false;

    proc.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    proc.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    const timer = options.timeout === undefined
      ? undefined
      : setTimeout(() => {
        timedOut = true;
        proc.kill('SIGKILL');
      }, options.timeout);

    const onAbort = (): void => {
      aborted = true;
      proc.kill('SIGKILL');
    };
    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const cleanup = (): void => {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    };

    proc.on('error', (error) => {
      cleanup();
      reject(error);
    });

    proc.on('close', (code) => {
      cleanup();
      resolve({
        status: code ?? -1,
        stdout: Buffer.concat(stdoutChunks),
        stderr: Buffer.concat(stderrChunks),
        timedOut,
        aborted,
      });
    });
  });
}
