/**
 * Thin wrapper around child_process for the ImageMagick and FFmpeg adapters.
 * Commands are argument arrays (binary first), never shell strings.
 */

import { execFileSync } from 'node:child_process';

/** Runs a command and returns its stdout. */
export type CommandRunner = (args: readonly string[]) => string;

export class CommandError extends Error {
  constructor(
    message: string,
    public command: string,
    public exitCode: number | null,
    public stderr: string
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

function readField(err: unknown, field: 'status' | 'stderr'): unknown {
  if (typeof err === 'object' && err !== null && field in err) {
    return Reflect.get(err, field);
  }
  return undefined;
}

export const runCommand: CommandRunner = (args) => {
  const [cmd, ...rest] = args;
  if (!cmd) throw new CommandError('Empty command', '', null, '');

  try {
    return execFileSync(cmd, rest, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
  } catch (err) {
    const status = readField(err, 'status');
    const stderr = readField(err, 'stderr');
    const exitCode = typeof status === 'number' ? status : null;
    const errText = typeof stderr === 'string' ? stderr.trim() : '';
    const lastLine = errText.split('\n').pop() ?? '';
    throw new CommandError(
      `${cmd} failed with exit code ${exitCode ?? 'unknown'}${lastLine ? `: ${lastLine}` : ''}`,
      cmd,
      exitCode,
      errText
    );
  }
};

/**
 * True when `cmd -version` runs. Both ImageMagick and FFmpeg accept it.
 */
export function commandExists(cmd: string): boolean {
  try {
    execFileSync(cmd, ['-version'], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

/**
 * Quote arguments for display in a shell, e.g. for --dry-run output.
 */
export function toShellCommand(args: readonly string[]): string {
  return args
    .map((arg) => {
      // Quote arguments that contain spaces or special characters
      if (/[\s;|&'"\\%!()*$<>]/.test(arg)) {
        return `'${arg.replace(/'/g, "'\\''")}'`;
      }
      return arg;
    })
    .join(' ');
}
