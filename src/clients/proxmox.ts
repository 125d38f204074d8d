import { z } from 'zod';
import { config, type ClusterNode } from '../config.js';

/**
 * Proxmox VE REST API client with token authentication.
 *
 * Each instance connects to a single PVE node via HTTPS on port 8006.
 * Self-signed TLS is accepted via NODE_TLS_REJECT_UNAUTHORIZED=0
 * (set in the container environment, no per-request agent needed).
 *
 * API token auth does NOT require CSRF tokens for write operations.
 * Every response is validated against a zod schema before it is returned.
 */

// -------------------------------------------------------------------- Schemas

const envelopeSchema = z.object({ data: z.unknown() });

export const nodeResourceSchema = z.object({
  node: z.string(),
  status: z.string().default('unknown'),
  cpu: z.number().default(0),
  mem: z.number().default(0),
  maxmem: z.number().default(0),
  disk: z.number().default(0),
  maxdisk: z.number().default(0),
});
export type NodeResource = z.infer<typeof nodeResourceSchema>;

export const guestResourceSchema = z.object({
  vmid: z.number(),
  name: z.string().default(''),
  node: z.string(),
  status: z.string(),
  type: z.enum(['qemu', 'lxc']),
});
export type GuestResource = z.infer<typeof guestResourceSchema>;

const upidSchema = z.string().nullable();

export interface ProxmoxClientOptions {
  host: string;
  port?: number;
  tokenId: string;
  tokenSecret: string;
  timeoutMs?: number;
}

export class ProxmoxClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly host: string;
  private readonly timeoutMs: number;

  constructor(opts: ProxmoxClientOptions) {
    const port = opts.port ?? 8006;
    this.host = opts.host;
    this.baseUrl = `https://${opts.host}:${port}/api2/json`;
    this.headers = {
      Authorization: `PVEAPIToken=${opts.tokenId}=${opts.tokenSecret}`,
      'Content-Type': 'application/json',
    };
    this.timeoutMs = opts.timeoutMs ?? 15_000;
  }

  // ------------------------------------------------------------------ Generic
  /**
   * Call a PVE API path, unwrap the `{ data }` envelope and validate it.
   */
  private async request<T>(method: 'GET' | 'POST', path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(url, {
        method,
        headers: this.headers,
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '(no body)');
        throw new Error(
          `PVE ${method} ${this.host}${path} failed: ${res.status} ${res.statusText} -- ${body}`,
        );
      }

      const envelope = envelopeSchema.parse(await res.json());
      return schema.parse(envelope.data);
    } catch (err: unknown) {
      if (err instanceof DOMException && err.name === 'AbortError') {
        throw new Error(`PVE ${method} ${this.host}${path} timed out after ${this.timeoutMs}ms`);
      }
      if (err instanceof Error && err.message.startsWith('PVE')) {
        throw err; // already our error
      }
      throw new Error(
        `PVE ${method} ${this.host}${path} error: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      clearTimeout(timer);
    }
  }

  // ------------------------------------------------------------------ Domain: Cluster
  /** Cluster-wide node resources (cpu, memory, disk usage). */
  async getNodeResources(): Promise<NodeResource[]> {
    return this.request('GET', '/cluster/resources?type=node', z.array(nodeResourceSchema));
  }

  /** Cluster-wide VM and container resources. */
  async getGuestResources(): Promise<GuestResource[]> {
    const items = await this.request('GET', '/cluster/resources?type=vm', z.array(z.unknown()));
    return items.flatMap((item) => {
      const parsed = guestResourceSchema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    });
  }

  /** PVE version string, used by the health check. */
  async getVersion(): Promise<string> {
    const data = await this.request('GET', '/version', z.object({ version: z.string() }));
    return data.version;
  }

  // ------------------------------------------------------------------ Domain: Guests
  /** Start a QEMU VM. Returns the task UPID. */
  async startVM(node: string, vmid: number): Promise<string | null> {
    return this.request('POST', `/nodes/${encodeURIComponent(node)}/qemu/${vmid}/status/start`, upidSchema);
  }

  /** Start an LXC container. Returns the task UPID. */
  async startCT(node: string, vmid: number): Promise<string | null> {
    return this.request('POST', `/nodes/${encodeURIComponent(node)}/lxc/${vmid}/status/start`, upidSchema);
  }
}

// -------------------------------------------------------------------- Instances

/**
 * Pre-built client instances -- one per cluster node.
 * Key = node name, Value = ProxmoxClient.
 */
export const proxmoxClients = new Map<string, ProxmoxClient>(
  config.clusterNodes.map((n: ClusterNode) => [
    n.name,
    new ProxmoxClient({
      host: n.host,
      tokenId: config.pveTokenId,
      tokenSecret: config.pveTokenSecret,
    }),
  ]),
);

/**
 * Return a client suitable for cluster-wide queries.
 * Uses the first configured node.
 */
export function getAnyClient(): ProxmoxClient {
  const first = config.clusterNodes[0];
  const client = first ? proxmoxClients.get(first.name) : undefined;
  if (!client) {
    throw new Error('No Proxmox nodes configured');
  }
  return client;
}

/**
 * Return the client for a specific node name (case-sensitive).
 */
export function getClientForNode(nodeName: string): ProxmoxClient {
  const client = proxmoxClients.get(nodeName);
  if (!client) {
    const available = Array.from(proxmoxClients.keys()).join(', ');
    throw new Error(
      `No Proxmox client for node "${nodeName}". Available: ${available}`,
    );
  }
  return client;
}
