import { beforeAll, describe, expect, it } from 'vitest';
import chalk from 'chalk';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileSessionStore, MemorySessionStore } from '../../session/session-store';
import { RecordingOutput } from '../../test-support/recording-output';
import { testConfig } from '../../test-support/test-config';
import { createAuthContext } from './context';
import { runLogout } from './logout';

describe('runLogout', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should clear the session and the cached account', () => {
    const store = new MemorySessionStore({ accessToken: 'abc', refreshToken: 'r1' });
    const context = createAuthContext(testConfig('/unused'), store);
    context.cache.set('account:default', { username: 'alice', email: 'alice@example.com' });
    const output = new RecordingOutput();

    const status = runLogout(context, output);

    expect(status).toBe(0);
    expect(store.load()).toEqual({});
    expect(context.cache.size).toBe(0);
    expect(output.lines).toEqual([{ level: 'success', message: 'You are now logged out.' }]);
  });

  it('should say so when there was no session', () => {
    const output = new RecordingOutput();

    const status = runLogout(createAuthContext(testConfig('/unused'), new MemorySessionStore()), output);

    expect(status).toBe(0);
    expect(output.lines).toEqual([{ level: 'info', message: 'You were not logged in.' }]);
  });

  it('should remove a session file that cannot be read', () => {
    const userDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hostctl-logout-test-'));
    try {
      const store = new FileSessionStore(userDir, 'default');
      fs.mkdirSync(path.dirname(store.filePath), { recursive: true });
      fs.writeFileSync(store.filePath, '{not json');
      const output = new RecordingOutput();

      const status = runLogout(createAuthContext(testConfig(userDir), store), output);

      expect(status).toBe(0);
      expect(fs.existsSync(store.filePath)).toBe(false);
      expect(output.messages('success')).toEqual(['Removed an unreadable session file. You are now logged out.']);
      expect(output.messages('debug')).toHaveLength(1);
    } finally {
      fs.rmSync(userDir, { recursive: true, force: true });
    }
  });

  it('should warn that an API token stays in use', () => {
    const output = new RecordingOutput();
    const context = createAuthContext(testConfig('/unused', { token: 'test-api-token' }), new MemorySessionStore());

    runLogout(context, output);

    expect(output.messages('warn')).toEqual(['An API token is set. It stays in use until HOSTCTL_TOKEN is unset.']);
  });
});
