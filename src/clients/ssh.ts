/**
 * Remote command runner for remediation actions. Keeps one SSH session per
 * cluster node (root, key auth) and replaces a session after any failure.
 */

import { NodeSSH } from 'node-ssh';
import type { ClusterNode } from '../config.js';
import { errorMessage } from '../engine/errors.js';
import { withTimeout } from '../engine/timeout.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  /** null when the remote side closed without an exit status */
  code: number | null;
}

/** The part of a node-ssh session the runner needs. */
export interface ShellSession {
  isConnected(): boolean;
  execCommand(command: string): Promise<ExecResult>;
  dispose(): void;
}

export type SessionFactory = (host: string, keyPath: string) => Promise<ShellSession>;

export interface NodeShellOptions {
  nodes: ClusterNode[];
  keyPath: string;
  commandTimeoutMs?: number;
  connect?: SessionFactory;
}

const CONNECT_TIMEOUT_MS = 10_000;

async function connectWithKey(host: string, keyPath: string): Promise<ShellSession> {
  const ssh = new NodeSSH();
  await ssh.connect({ host, username: 'root', privateKeyPath: keyPath, readyTimeout: CONNECT_TIMEOUT_MS });
  return ssh;
}

export class NodeShell {
  private readonly sessions = new Map<string, ShellSession>();
  private readonly connect: SessionFactory;
  private readonly commandTimeoutMs: number;

  constructor(private readonly opts: NodeShellOptions) {
    this.connect = opts.connect ?? connectWithKey;
    this.commandTimeoutMs = opts.commandTimeoutMs ?? 30_000;
  }

  /** Run `command` on a node given by name; unknown names are used as the address. */
  readonly exec = async (node: string, command: string): Promise<ExecResult> => {
    const host = this.opts.nodes.find((n) => n.name.toLowerCase() === node.toLowerCase())?.host ?? node;
    const session = await this.session(host);

    try {
      return await withTimeout(
        session.execCommand(command),
        this.commandTimeoutMs,
        () => new Error(`timed out after ${this.commandTimeoutMs}ms`),
      );
    } catch (err) {
      this.drop(host, session);
      throw new Error(`SSH exec on ${node} failed: ${errorMessage(err)}`);
    }
  };

  close(): void {
    for (const [host, session] of this.sessions) {
      this.drop(host, session);
    }
  }

  private async session(host: string): Promise<ShellSession> {
    const existing = this.sessions.get(host);
    if (existing?.isConnected()) return existing;
    if (existing) this.drop(host, existing);

    try {
      const session = await this.connect(host, this.opts.keyPath);
      this.sessions.set(host, session);
      return session;
    } catch (err) {
      throw new Error(`SSH connect to ${host} failed: ${errorMessage(err)}`);
    }
  }

  private drop(host: string, session: ShellSession): void {
    this.sessions.delete(host);
    try {
      session.dispose();
    } catch (err) {
      console.warn(`[SSH] Dispose of ${host} failed:`, errorMessage(err));
    }
  }
}
