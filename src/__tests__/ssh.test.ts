import { describe, it, expect, vi, afterEach, type Mock } from 'vitest';
import { NodeShell, type ExecResult, type SessionFactory, type ShellSession } from '../clients/ssh.js';

interface FakeSession extends ShellSession {
  execCommand: Mock<ShellSession['execCommand']>;
  dispose: Mock<ShellSession['dispose']>;
  connected: boolean;
}

function fakeSession(result: ExecResult = { stdout: 'ok', stderr: '', code: 0 }): FakeSession {
  const session: FakeSession = {
    connected: true,
    isConnected: () => session.connected,
    execCommand: vi.fn<ShellSession['execCommand']>(async () => result),
    dispose: vi.fn<ShellSession['dispose']>(() => {
      session.connected = false;
    }),
  };
  return session;
}

describe('NodeShell', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('resolves node names and reuses the session', async () => {
    const session = fakeSession();
    const connect = vi.fn<SessionFactory>(async () => session);
    const shell = new NodeShell({ nodes: [{ name: 'pve1', host: '10.0.0.11' }], keyPath: '/keys/id', connect });

    expect(await shell.exec('PVE1', 'uptime')).toEqual({ stdout: 'ok', stderr: '', code: 0 });
    await shell.exec('pve1', 'df -h');

    expect(connect).toHaveBeenCalledTimes(1);
    expect(connect).toHaveBeenCalledWith('10.0.0.11', '/keys/id');
    expect(session.execCommand.mock.calls).toEqual([['uptime'], ['df -h']]);
  });

  it('uses unknown names as the address', async () => {
    const connect = vi.fn<SessionFactory>(async () => fakeSession());
    const shell = new NodeShell({ nodes: [], keyPath: '/keys/id', connect });

    await shell.exec('10.0.0.99', 'true');

    expect(connect).toHaveBeenCalledWith('10.0.0.99', '/keys/id');
  });

  it('reconnects after a failed command', async () => {
    const broken = fakeSession();
    broken.execCommand.mockRejectedValueOnce(new Error('channel closed'));
    const fresh = fakeSession();
    const connect = vi.fn<SessionFactory>().mockResolvedValueOnce(broken).mockResolvedValueOnce(fresh);
    const shell = new NodeShell({ nodes: [], keyPath: '/keys/id', connect });

    await expect(shell.exec('pve1', 'uptime')).rejects.toThrow('SSH exec on pve1 failed: channel closed');
    expect(broken.dispose).toHaveBeenCalledTimes(1);

    await shell.exec('pve1', 'uptime');
    expect(fresh.execCommand).toHaveBeenCalledWith('uptime');
  });

  it('gives up on a command that never returns', async () => {
    vi.useFakeTimers();
    const session = fakeSession();
    session.execCommand.mockReturnValueOnce(new Promise<ExecResult>(() => {}));
    const shell = new NodeShell({ nodes: [], keyPath: '/keys/id', commandTimeoutMs: 500, connect: async () => session });

    const run = shell.exec('pve1', 'sleep 60');
    const assertion = expect(run).rejects.toThrow('SSH exec on pve1 failed: timed out after 500ms');
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    expect(session.dispose).toHaveBeenCalledTimes(1);
  });

  it('wraps connection errors', async () => {
    const shell = new NodeShell({
      nodes: [],
      keyPath: '/keys/id',
      connect: () => Promise.reject(new Error('ECONNREFUSED')),
    });

    await expect(shell.exec('pve9', 'true')).rejects.toThrow('SSH connect to pve9 failed: ECONNREFUSED');
  });

  it('disposes every session on close', async () => {
    const a = fakeSession();
    const b = fakeSession();
    const connect = vi.fn<SessionFactory>().mockResolvedValueOnce(a).mockResolvedValueOnce(b);
    const shell = new NodeShell({ nodes: [], keyPath: '/keys/id', connect });
    await shell.exec('pve1', 'true');
    await shell.exec('pve2', 'true');

    shell.close();

    expect(a.dispose).toHaveBeenCalledTimes(1);
    expect(b.dispose).toHaveBeenCalledTimes(1);
  });
});
