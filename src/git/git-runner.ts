import { execFileSync } from 'child_process';
import { CollectorError } from '../errors.js';

/** Runs one git command in `cwd` and returns its non-empty output lines. */
export type GitRunner = (cwd: string, args: readonly string[]) => string[];

export const runGit: GitRunner = (cwd, args) => {
  const command = ['git', ...args].join(' ');
  let output: string;
  try {
    output = execFileSync('git', args, {
      cwd,
      encoding: 'utf8',
      maxBuffer: 200 * 1024 * 1024,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (err) {
    throw new CollectorError(command, stderrOf(err), { cause: err });
  }
  return splitLines(output);
};

export function splitLines(output: string): string[] {
  return output.split('\n').map(line => line.replace(/\r$/, '')).filter(line => line.trim() !== '');
}

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string' && stderr.trim()) return stderr;
    if (Buffer.isBuffer(stderr) && stderr.length > 0) return stderr.toString('utf8');
  }
  return err instanceof Error ? err.message : String(err);
}
