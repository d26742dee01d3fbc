import { createHash } from 'crypto';

export const GENESIS_HASH = '0'.repeat(64);

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

// JSON with recursively sorted keys; undefined members are dropped like JSON.stringify does
export function canonicalize(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return '[' + value.map(item => (item === undefined ? 'null' : canonicalize(item))).join(',') + ']';
  }

  const members = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => JSON.stringify(key) + ':' + canonicalize(member));

  return '{' + members.join(',') + '}';
}

// Hash chain for tamper-evident log
export class HashChain {
  private prevHash: string;

  constructor(tailHash?: string) {
    this.prevHash = tailHash ?? GENESIS_HASH;
  }

  advance(chainHash: string): void {
    this.prevHash = chainHash;
  }

  static chainHash(prevHash: string, record: object): string {
    return sha256(prevHash + canonicalize(record));
  }

  static verifyRecord(record: object, prevHash: string, expectedChainHash: string): boolean {
    return HashChain.chainHash(prevHash, record) === expectedChainHash;
  }

  getCurrentHash(): string {
    return this.prevHash;
  }
}
