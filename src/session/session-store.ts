import * as fs from 'fs';
import * as path from 'path';

/**
 * Persisted credentials for one session.
 */
export interface SessionData {
  accessToken?: string;
  tokenType?: string;
  /** Absolute expiry, unix seconds */
  expires?: number;
  refreshToken?: string;
}

export interface SessionStore {
  load(): SessionData;
  save(data: SessionData): void;
  clear(): void;
}

export const SESSION_DIRNAME = '.session';

export function sessionFilePath(userDir: string, sessionId: string): string {
  return path.join(userDir, SESSION_DIRNAME, `sess-cli-${sessionId}.json`);
}

/**
 * Keep only the known fields with the right types.
 */
export function normalizeSessionData(raw: unknown): SessionData {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return {};
  }
  const record: Record<string, unknown> = { ...raw };
  const data: SessionData = {};
  if (typeof record.accessToken === 'string') data.accessToken = record.accessToken;
  if (typeof record.tokenType === 'string') data.tokenType = record.tokenType;
  if (typeof record.expires === 'number' && Number.isFinite(record.expires)) data.expires = record.expires;
  if (typeof record.refreshToken === 'string') data.refreshToken = record.refreshToken;
  return data;
}

/**
 * JSON session file at ~/.hostctl/.session/sess-cli-<id>.json, owner-only.
 * Writes go through a temp file and a rename.
 */
export class FileSessionStore implements SessionStore {
  public readonly filePath: string;

  constructor(userDir: string, sessionId: string) {
    this.filePath = sessionFilePath(userDir, sessionId);
  }

  load(): SessionData {
    if (!fs.existsSync(this.filePath)) {
      return {};
    }
    try {
      return normalizeSessionData(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));
    } catch (err) {
      throw new Error(
        `Failed to read session file ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  save(data: SessionData): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2) + '\n', { mode: 0o600 });
    fs.renameSync(tmp, this.filePath);
  }

  clear(): void {
    fs.rmSync(this.filePath, { force: true });
  }
}

/**
 * In-memory store, for tests and one-off clients.
 */
export class MemorySessionStore implements SessionStore {
  private data: SessionData;

  constructor(initial: SessionData = {}) {
    this.data = { ...initial };
  }

  load(): SessionData {
    return { ...this.data };
  }

  save(data: SessionData): void {
    this.data = { ...data };
  }

  clear(): void {
    this.data = {};
  }
}
