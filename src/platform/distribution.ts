/**
 * Distributed identity
 *
 * Naming the node requires the port-mapper daemon; when it does not answer the
 * process stays un-networked as `nonode@nohost`.
 */

import net from 'node:net';
import os from 'node:os';

import { DISTRIBUTION } from '../constants/index.js';

export type NameMode = 'longnames' | 'shortnames';

export type DistributionResult =
  | { ok: true; node: string }
  | { ok: false; reason: 'nodistribution' | 'invalid_name'; detail?: string };

export interface DistributionService {
  start(name: string, mode: NameMode): Promise<DistributionResult>;
  currentNode(): string;
}

export type PortMapperOptions = {
  host?: string;
  port?: number;
  timeoutMs?: number;
  hostname?: () => string;
};

const NODE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

async function canConnect(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return await new Promise<boolean>((resolve) => {
    const socket = net.connect({ host, port });
    const done = (result: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(result);
    };
    socket.setTimeout(timeoutMs, () => done(false));
    socket.once('connect', () => done(true));
    socket.once('error', () => done(false));
  });
}

export function qualifyNodeName(name: string, mode: NameMode, hostname: string): string {
  if (name.includes('@')) {
    return name;
  }
  const host = mode === 'shortnames' ? hostname.split('.')[0] : hostname;
  return `${name}@${host}`;
}

export class PortMapperDistribution implements DistributionService {
  private node: string = DISTRIBUTION.UNNAMED_NODE;
  private readonly host: string;
  private readonly port: number;
  private readonly timeoutMs: number;
  private readonly hostname: () => string;

  constructor(options: PortMapperOptions = {}) {
    this.host = options.host ?? DISTRIBUTION.PORT_MAPPER_HOST;
    this.port = options.port ?? DISTRIBUTION.PORT_MAPPER_PORT;
    this.timeoutMs = options.timeoutMs ?? DISTRIBUTION.PROBE_TIMEOUT_MS;
    this.hostname = options.hostname ?? (() => os.hostname());
  }

  async start(name: string, mode: NameMode): Promise<DistributionResult> {
    const [local] = name.split('@');
    if (!NODE_NAME_PATTERN.test(local)) {
      return { ok: false, reason: 'invalid_name', detail: name };
    }
    const reachable = await canConnect(this.host, this.port, this.timeoutMs);
    if (!reachable) {
      return { ok: false, reason: 'nodistribution', detail: `${this.host}:${this.port}` };
    }
    this.node = qualifyNodeName(name, mode, this.hostname());
    return { ok: true, node: this.node };
  }

  currentNode(): string {
    return this.node;
  }
}
