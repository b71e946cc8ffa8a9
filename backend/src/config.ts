/**
 * Peer Configuration
 * Environment-driven settings with defaults for a single LAN peer
 */

import os from 'os';

// ════════════════════════════════════════════════════════════════════
// DEFAULTS
// ════════════════════════════════════════════════════════════════════

export const DEFAULT_DISCOVERY_PORT = 50999;
export const DEFAULT_BROADCAST_ADDRESS = '255.255.255.255';
export const SOFT_PAYLOAD_LIMIT = 20 * 1024;   // avatar-sized messages warn
export const HARD_PAYLOAD_LIMIT = 65507;       // max UDP/IPv4 payload

export interface PeerConfig {
  username: string;
  ip: string;
  discoveryPort: number;
  broadcastAddress: string;
  unicastPort: number;          // 0 = ephemeral
  discoveryIntervalMs: number;
  peerTimeoutMs: number;
  sweepIntervalMs: number;
  receiveTimeoutMs: number;
  dedupCacheSize: number;       // 0 disables duplicate suppression
  tokenVerification: boolean;
  tokenTtlSeconds: number;
  postTtlSeconds: number;
  controlPort: number;
  verbose: boolean;
}

export const DEFAULT_CONFIG: Omit<PeerConfig, 'username' | 'ip'> = {
  discoveryPort: DEFAULT_DISCOVERY_PORT,
  broadcastAddress: DEFAULT_BROADCAST_ADDRESS,
  unicastPort: 0,
  discoveryIntervalMs: 30_000,
  peerTimeoutMs: 300_000,       // 5 minutes
  sweepIntervalMs: 10_000,
  receiveTimeoutMs: 1_000,
  dedupCacheSize: 512,
  tokenVerification: false,
  tokenTtlSeconds: 3600,
  postTtlSeconds: 3600,
  controlPort: 3000,
  verbose: false,
};

// ════════════════════════════════════════════════════════════════════
// LOADING
// ════════════════════════════════════════════════════════════════════

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    console.warn(`[Config] Ignoring ${key}=${raw} (expected a non-negative integer), using ${fallback}`);
    return fallback;
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

/**
 * First non-internal IPv4 address, or loopback when offline.
 */
export function detectLocalIp(): string {
  const interfaces = os.networkInterfaces();
  for (const addresses of Object.values(interfaces)) {
    for (const info of addresses ?? []) {
      if (info.family === 'IPv4' && !info.internal) {
        return info.address;
      }
    }
  }
  return '127.0.0.1';
}

export function loadConfig(env: Env = process.env): PeerConfig {
  return {
    username: env.PEER_USERNAME || os.userInfo().username,
    ip: env.PEER_IP || detectLocalIp(),
    discoveryPort: readInt(env, 'DISCOVERY_PORT', DEFAULT_CONFIG.discoveryPort),
    broadcastAddress: env.BROADCAST_ADDRESS || DEFAULT_CONFIG.broadcastAddress,
    unicastPort: readInt(env, 'UNICAST_PORT', DEFAULT_CONFIG.unicastPort),
    discoveryIntervalMs: readInt(env, 'DISCOVERY_INTERVAL_MS', DEFAULT_CONFIG.discoveryIntervalMs),
    peerTimeoutMs: readInt(env, 'PEER_TIMEOUT_MS', DEFAULT_CONFIG.peerTimeoutMs),
    sweepIntervalMs: readInt(env, 'SWEEP_INTERVAL_MS', DEFAULT_CONFIG.sweepIntervalMs),
    receiveTimeoutMs: readInt(env, 'RECEIVE_TIMEOUT_MS', DEFAULT_CONFIG.receiveTimeoutMs),
    dedupCacheSize: readInt(env, 'DEDUP_CACHE_SIZE', DEFAULT_CONFIG.dedupCacheSize),
    tokenVerification: readBool(env, 'TOKEN_VERIFICATION', DEFAULT_CONFIG.tokenVerification),
    tokenTtlSeconds: readInt(env, 'TOKEN_TTL_SECONDS', DEFAULT_CONFIG.tokenTtlSeconds),
    postTtlSeconds: readInt(env, 'POST_TTL_SECONDS', DEFAULT_CONFIG.postTtlSeconds),
    controlPort: readInt(env, 'CONTROL_PORT', DEFAULT_CONFIG.controlPort),
    verbose: readBool(env, 'LOG_VERBOSE', DEFAULT_CONFIG.verbose),
  };
}

export function userIdFor(config: Pick<PeerConfig, 'username' | 'ip'>): string {
  return `${config.username}@${config.ip}`;
}
