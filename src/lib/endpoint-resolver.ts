/**
 * AnkiConnect Endpoint Resolution
 *
 * Picks the URL the client talks to, once at startup. An explicit
 * ANKI_CONNECT_URL always wins. Inside WSL, Anki usually runs on the Windows
 * host, so a handful of host addresses are probed over TCP before falling
 * back to loopback.
 */

import { readFileSync } from 'node:fs';
import { Socket } from 'node:net';
import { type Config } from './types.js';
import { type Logger } from './logger.js';

const LOOPBACK = '127.0.0.1';
const BRIDGE_ADDRESSES = ['172.17.0.1', '172.18.0.1'];

export interface EndpointResolver {
  resolve(): Promise<string>;
}

/**
 * Resolves true when a TCP connection to host:port opens within the timeout
 */
export type EndpointProbe = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

/**
 * The bits of the host OS that discovery looks at
 */
export interface HostEnvironment {
  isWsl(): boolean;
  resolvConf(): string | null;
  routeTable(): string | null;
}

export const tcpProbe: EndpointProbe = (host, port, timeoutMs) =>
  new Promise((resolve) => {
    const socket = new Socket();
    const finish = (ok: boolean) => {
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
    socket.connect(port, host);
  });

function readOptional(path: string): string | null {
  try {
    return readFileSync(path, 'utf-8');
  } catch {
    return null;
  }
}

export const nodeHostEnvironment: HostEnvironment = {
  isWsl() {
    if (process.platform !== 'linux') return false;
    if (process.env.WSL_DISTRO_NAME) return true;
    return /microsoft|wsl/i.test(readOptional('/proc/version') ?? '');
  },
  resolvConf() {
    return readOptional('/etc/resolv.conf');
  },
  routeTable() {
    return readOptional('/proc/net/route');
  },
};

/**
 * First IPv4 nameserver listed in resolv.conf
 */
export function parseNameserver(resolvConf: string): string | null {
  for (const line of resolvConf.split('\n')) {
    const match = /^\s*nameserver\s+(\d{1,3}(?:\.\d{1,3}){3})\s*$/.exec(line);
    if (match) return match[1];
  }
  return null;
}

/**
 * Gateway of the default route in /proc/net/route.
 *
 * Addresses there are little-endian hex, so 0101A8C0 is 192.168.1.1.
 */
export function parseDefaultGateway(routeTable: string): string | null {
  for (const line of routeTable.split('\n').slice(1)) {
    const columns = line.trim().split(/\s+/);
    if (columns.length < 3 || columns[1] !== '00000000') continue;

    const gateway = columns[2];
    if (!/^[0-9A-Fa-f]{8}$/.test(gateway) || gateway === '00000000') continue;

    const octets: number[] = [];
    for (let i = 6; i >= 0; i -= 2) {
      octets.push(parseInt(gateway.slice(i, i + 2), 16));
    }
    return octets.join('.');
  }
  return null;
}

export interface AutoEndpointResolverOptions {
  host?: HostEnvironment;
  probe?: EndpointProbe;
  logger?: Logger;
}

export class AutoEndpointResolver implements EndpointResolver {
  private config: Config;
  private host: HostEnvironment;
  private probe: EndpointProbe;
  private logger?: Logger;

  constructor(config: Config, options: AutoEndpointResolverOptions = {}) {
    this.config = config;
    this.host = options.host ?? nodeHostEnvironment;
    this.probe = options.probe ?? tcpProbe;
    this.logger = options.logger;
  }

  /**
   * Host addresses to try inside WSL, in order of preference
   */
  candidates(): string[] {
    const hosts: string[] = [];

    const resolvConf = this.host.resolvConf();
    const nameserver = resolvConf ? parseNameserver(resolvConf) : null;
    if (nameserver) hosts.push(nameserver);

    const routeTable = this.host.routeTable();
    const gateway = routeTable ? parseDefaultGateway(routeTable) : null;
    if (gateway) hosts.push(gateway);

    hosts.push(...BRIDGE_ADDRESSES, LOOPBACK);
    return [...new Set(hosts)];
  }

  async resolve(): Promise<string> {
    const { ankiConnectUrl, ankiConnectPort: port, probeTimeoutMs } = this.config;

    if (ankiConnectUrl) {
      this.logger?.debug(`Using configured AnkiConnect URL ${ankiConnectUrl}`);
      return ankiConnectUrl;
    }

    if (this.host.isWsl()) {
      for (const host of this.candidates()) {
        this.logger?.debug(`Probing AnkiConnect at ${host}:${port}`);
        if (await this.probe(host, port, probeTimeoutMs)) {
          this.logger?.info(`Found AnkiConnect at ${host}:${port}`);
          return endpointUrl(host, port);
        }
      }
      this.logger?.warn('No AnkiConnect endpoint answered from WSL, falling back to loopback');
    }

    return endpointUrl(LOOPBACK, port);
  }
}

function endpointUrl(host: string, port: number): string {
  return `http://${host}:${port}`;
}
