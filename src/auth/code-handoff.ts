import * as fs from 'fs';
import * as path from 'path';

/**
 * File-backed one-shot channel carrying the authorization code from the
 * listener child process back to the CLI.
 *
 * One writer (the listener), one reader (the CLI). The file starts empty and,
 * once written, holds the final code.
 */

export const HANDOFF_DIR_PREFIX = 'oauth-listener-';
export const HANDOFF_FILENAME = '.code';

export interface HandoffHandle {
  /** Private directory owned by one login attempt */
  readonly dir: string;
  /** The handoff file inside `dir` */
  readonly file: string;
}

export type HandoffPoll =
  | { status: 'empty' }
  | { status: 'missing' }
  | { status: 'ready'; code: string };

/**
 * Create a fresh private directory under `parentDir` holding an empty
 * handoff file with owner-only permissions.
 */
export function createHandoff(parentDir: string): HandoffHandle {
  fs.mkdirSync(parentDir, { recursive: true, mode: 0o700 });
  const dir = fs.mkdtempSync(path.join(parentDir, HANDOFF_DIR_PREFIX));
  fs.chmodSync(dir, 0o700);
  const file = path.join(dir, HANDOFF_FILENAME);
  fs.writeFileSync(file, '', { mode: 0o600, flag: 'wx' });
  fs.chmodSync(file, 0o600);
  return { dir, file };
}

/**
 * Write the code. The content goes to a temp file first and is renamed over
 * the handoff file, so a concurrent reader sees either the empty file or the
 * whole code.
 */
export function writeHandoff(target: HandoffHandle | string, code: string): void {
  const file = typeof target === 'string' ? target : target.file;
  const tmp = `${file}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, code, { mode: 0o600 });
  fs.renameSync(tmp, file);
}

export function pollHandoff(handle: HandoffHandle): HandoffPoll {
  let content: string;
  try {
    content = fs.readFileSync(handle.file, 'utf-8');
  } catch (error) {
    if (isErrno(error) && error.code === 'ENOENT') {
      return { status: 'missing' };
    }
    throw error;
  }
  return content.length === 0 ? { status: 'empty' } : { status: 'ready', code: content };
}

/**
 * Remove the handoff directory. Safe to call repeatedly or after the
 * directory is gone.
 */
export function closeHandoff(handle: HandoffHandle): void {
  fs.rmSync(handle.dir, { recursive: true, force: true });
}

function isErrno(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
