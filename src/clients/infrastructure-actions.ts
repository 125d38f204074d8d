/**
 * Action collaborator backed by the cluster: SSH for host-level commands,
 * the Proxmox API for guests.
 *
 * Targets come from runbook target keys (`container:nginx`,
 * `service:pve1:docker`, `guest:pve1:lxc:105`, ...). Every segment is checked
 * against a strict allow-list before a command string is built, and custom
 * free-text remediations are never executed.
 */

import type {
  ActionCollaborator,
  ActionContext,
  ActionOutcome,
} from '../engine/action-executor.js';
import type { ExecResult } from './ssh.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface GuestStarter {
  startVM(node: string, vmid: number): Promise<string | null>;
  startCT(node: string, vmid: number): Promise<string | null>;
}

export interface InfrastructureDeps {
  /** Run a shell command on a node (by name or address). */
  exec: (node: string, command: string) => Promise<ExecResult>;
  /** Proxmox client for the node that owns a guest. */
  proxmoxFor: (node: string) => GuestStarter;
  /** Node running the Docker engine. */
  dockerHost: string;
}

// ---------------------------------------------------------------------------
// Target parsing
// ---------------------------------------------------------------------------

const SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._@-]*$/;
const PATH = /^\/[A-Za-z0-9._/-]*$/;

export class InvalidTargetError extends Error {
  constructor(target: string, why: string) {
    super(`Invalid target "${target}": ${why}`);
    this.name = 'InvalidTargetError';
  }
}

/** Split `kind:a:b` and validate the kind and segment count. */
export function parseTarget(target: string, kind: string, segments: number): string[] {
  const parts = target.split(':');
  if (parts[0] !== kind) {
    throw new InvalidTargetError(target, `expected a ${kind} target`);
  }
  const rest = parts.slice(1);
  if (rest.length !== segments) {
    throw new InvalidTargetError(target, `expected ${segments} segment(s)`);
  }
  return rest;
}

function safeSegment(target: string, value: string): string {
  if (!SEGMENT.test(value)) {
    throw new InvalidTargetError(target, `unsafe segment "${value}"`);
  }
  return value;
}

function safePath(target: string, value: string): string {
  if (!PATH.test(value) || value.split('/').includes('..')) {
    throw new InvalidTargetError(target, `unsafe path "${value}"`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Collaborator
// ---------------------------------------------------------------------------

function fromExec(result: ExecResult, ok: string): ActionOutcome {
  if (result.code === 0) {
    return { success: true, message: ok };
  }
  const detail = (result.stderr || result.stdout).trim().slice(0, 300);
  return { success: false, message: `exit ${result.code ?? 'unknown'}${detail ? `: ${detail}` : ''}` };
}

export function createInfrastructureActions(deps: InfrastructureDeps): ActionCollaborator {
  return {
    async container_restart(target: string): Promise<ActionOutcome> {
      if (target.startsWith('guest:')) {
        const [node, type, vmid] = parseTarget(target, 'guest', 3).map((s) => safeSegment(target, s));
        const id = parseInt(vmid, 10);
        if (!Number.isInteger(id) || (type !== 'lxc' && type !== 'qemu')) {
          throw new InvalidTargetError(target, 'expected guest:<node>:<lxc|qemu>:<vmid>');
        }
        const client = deps.proxmoxFor(node);
        const upid = type === 'lxc' ? await client.startCT(node, id) : await client.startVM(node, id);
        return { success: true, message: `Start task submitted for ${type} ${id} on ${node}${upid ? ` (${upid})` : ''}` };
      }

      const [name] = parseTarget(target, 'container', 1).map((s) => safeSegment(target, s));
      if (!deps.dockerHost) {
        return { success: false, message: 'No Docker host configured' };
      }
      const result = await deps.exec(deps.dockerHost, `docker restart ${name}`);
      return fromExec(result, `Container ${name} restarted`);
    },

    async service_restart(target: string): Promise<ActionOutcome> {
      const [host, unit] = parseTarget(target, 'service', 2).map((s) => safeSegment(target, s));
      const result = await deps.exec(host, `systemctl restart ${unit} && systemctl is-active ${unit}`);
      return fromExec(result, `Service ${unit} restarted on ${host}`);
    },

    async disk_cleanup(target: string): Promise<ActionOutcome> {
      const [rawHost, rawPath] = parseTarget(target, 'disk', 2);
      const host = safeSegment(target, rawHost);
      const path = safePath(target, rawPath);
      const command = [
        `find ${path} -type f \\( -name '*.gz' -o -name '*.[0-9]' \\) -mtime +7 -delete`,
        'journalctl --vacuum-time=7d',
        '(command -v docker >/dev/null 2>&1 && docker system prune -f || true)',
      ].join(' && ');
      const result = await deps.exec(host, command);
      return fromExec(result, `Cleaned ${path} and pruned Docker on ${host}`);
    },

    async log_rotation(target: string): Promise<ActionOutcome> {
      const [host] = parseTarget(target, 'logs', 1).map((s) => safeSegment(target, s));
      const result = await deps.exec(host, 'logrotate -f /etc/logrotate.conf');
      return fromExec(result, `Logs rotated on ${host}`);
    },

    async resource_scale(target: string): Promise<ActionOutcome> {
      const [host] = parseTarget(target, 'memory', 1).map((s) => safeSegment(target, s));
      const result = await deps.exec(host, 'sync && echo 1 > /proc/sys/vm/drop_caches');
      return fromExec(result, `Page cache dropped on ${host}`);
    },

    async custom(_target: string, context: ActionContext): Promise<ActionOutcome> {
      return {
        success: false,
        manual: true,
        message: `Manual action required: ${context.instruction ?? context.description}`,
      };
    },
  };
}
