import { execFile } from 'child_process';
import { promisify } from 'util';

export const execFileAsync = promisify(execFile);

/**
 * Raised when an external command exits non-zero or cannot be spawned
 */
export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly output: string;

  constructor(command: string, exitCode: number | null, output: string) {
    super(`Command failed (${exitCode ?? 'spawn error'}): ${command}${output ? `\n${output}` : ''}`);
    this.name = 'CommandError';
    this.command = command;
    this.exitCode = exitCode;
    this.output = output;
  }
}

/**
 * Runs an external program and returns its trimmed stdout.
 * Implementations throw CommandError on failure.
 */
export interface ProcessRunner {
  run(file: string, args: string[]): Promise<string>;
}

interface ExecFailure {
  code?: number | string;
  stdout?: string;
  stderr?: string;
  message?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null;
}

/**
 * Execute a program with arguments (no shell) and return stdout
 * Throws CommandError on non-zero exit code
 */
export async function execCommand(file: string, args: string[]): Promise<string> {
  const commandLine = [file, ...args].join(' ');
  try {
    const { stdout } = await execFileAsync(file, args, { encoding: 'utf-8' });
    return stdout.trim();
  } catch (error) {
    if (!isExecFailure(error)) {
      throw new CommandError(commandLine, null, String(error));
    }
    const exitCode = typeof error.code === 'number' ? error.code : null;
    const output = [error.stdout, error.stderr]
      .filter((part): part is string => typeof part === 'string' && part.trim() !== '')
      .map((part) => part.trim())
      .join('\n');
    throw new CommandError(commandLine, exitCode, output || error.message || '');
  }
}

export const defaultProcessRunner: ProcessRunner = {
  run: execCommand,
};

/**
 * Prefix a command with `sudo -n` (non-interactive) when privileged
 */
export function privileged(useSudo: boolean, file: string, args: string[]): [string, string[]] {
  return useSudo ? ['sudo', ['-n', file, ...args]] : [file, args];
}
