import { spawn } from 'node:child_process';

export interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

export type CommandRunner = (argv: readonly string[], options?: RunCommandOptions) => Promise<CommandResult>;

/**
 * Runs a short-lived command to completion and collects its output.
 * Rejects only when the command cannot be started (or is aborted); a non-zero exit resolves.
 */
export const runCommand: CommandRunner = (argv, options = {}) => new Promise((resolve, reject) => {
  const [ command, ...args ] = argv;
  if (!command) {
    reject(new Error('Empty command'));
    return;
  }

  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    signal: options.signal,
    stdio: [ 'ignore', 'pipe', 'pipe' ],
  });

  const stdout: Buffer[] = [];
  const stderr: Buffer[] = [];
  child.stdout.on('data', (data: Buffer) => stdout.push(data));
  child.stderr.on('data', (data: Buffer) => stderr.push(data));

  child.once('error', reject);
  child.once('close', (code, signal) => {
    resolve({
      code,
      signal,
      stdout: Buffer.concat(stdout).toString('utf-8'),
      stderr: Buffer.concat(stderr).toString('utf-8'),
    });
  });
});

export function isCommandMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
