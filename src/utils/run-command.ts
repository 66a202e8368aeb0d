import { execFile } from 'child_process';
import path from 'path';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface CommandOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  timeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Run an executable in a child process so model inference never blocks the
 * event loop. Rejects with stderr attached when the process exits non-zero.
 */
export async function runCommand(
  file: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      env: options.env ?? process.env,
      cwd: options.cwd,
      timeout: options.timeoutMs ?? 0,
      maxBuffer: 64 * 1024 * 1024,
      encoding: 'utf8',
    });
    return { stdout, stderr };
  } catch (err) {
    const stderr =
      typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string'
        ? err.stderr.trim()
        : '';
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`${file} failed: ${stderr || message}`, { cause: err });
  }
}

/**
 * Resolve a configured executable. Paths are taken relative to the working
 * directory; bare names are left for PATH lookup.
 */
export function resolveCommand(command: string, cwd: string = process.cwd()): string {
  return command.includes('/') || command.includes(path.sep) ? path.resolve(cwd, command) : command;
}

/** Signature of runCommand, so collaborators can be given a fake runner. */
export type CommandRunner = typeof runCommand;
