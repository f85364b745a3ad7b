import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  timeoutMs?: number;
  /** Upper bound for stdout, large enough for a base64 cover image. */
  maxBuffer?: number;
}

/**
 * Runs an executable without a shell. Rejects with a CommandError carrying
 * the exit code and stderr.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export class CommandError extends Error {
  public readonly name = 'CommandError';

  constructor(
    public readonly file: string,
    public readonly code: number | string | null,
    public readonly stderr: string,
    message: string,
  ) {
    super(message);
  }

  /** The executable is not installed. */
  public get missing(): boolean {
    return this.code === 'ENOENT';
  }
}

interface ExecFailure {
  code?: number | string | null;
  stderr?: string | Buffer;
  killed?: boolean;
  message?: string;
}

export const runCommand: CommandRunner = async (file, args, options = {}) => {
  try {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
      timeout: options.timeoutMs ?? 5000,
      maxBuffer: options.maxBuffer ?? 16 * 1024 * 1024,
      windowsHide: true,
      encoding: 'utf8',
    });
    return { stdout, stderr };
  } catch (error) {
    const failure: ExecFailure = typeof error === 'object' && error !== null ? error : {};
    const stderr = failure.stderr ? String(failure.stderr) : '';
    const reason = failure.killed ? 'timed out' : (failure.message ?? 'failed');
    throw new CommandError(file, failure.code ?? null, stderr, `${file} ${reason}`);
  }
};
