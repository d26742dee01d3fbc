import { existsSync, mkdirSync } from 'fs';
import { appendFile, open, readFile, stat, truncate } from 'fs/promises';
import { dirname } from 'path';
import type { AuditEntry } from '../types/index.js';
import { errorMessage } from '../errors.js';
import { AuditEntrySchema, ChainFieldsSchema } from './schema.js';

export interface ChainTail {
  sequence: number;
  hash: string;
}

/** One stored record as read back, before any chain checks. */
export type StoredRecord =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

export interface AuditStore {
  /** Replays existing records to restore the tail and the id index. */
  load(): Promise<void>;
  append(entry: AuditEntry): Promise<void>;
  has(interactionId: string): boolean;
  get(interactionId: string): Promise<AuditEntry | null>;
  tail(): ChainTail | null;
  size(): number;
  /** Every record in write order, unparsed beyond JSON. */
  records(): Promise<StoredRecord[]>;
  /** Well-formed entries in write order. */
  entries(): Promise<AuditEntry[]>;
}

export class MemoryAuditStore implements AuditStore {
  private readonly items: AuditEntry[] = [];
  private readonly byId = new Map<string, AuditEntry>();

  async load(): Promise<void> {
    // nothing persisted
  }

  async append(entry: AuditEntry): Promise<void> {
    this.items.push(entry);
    this.byId.set(entry.interaction_id, entry);
  }

  has(interactionId: string): boolean {
    return this.byId.has(interactionId);
  }

  async get(interactionId: string): Promise<AuditEntry | null> {
    return this.byId.get(interactionId) ?? null;
  }

  tail(): ChainTail | null {
    const last = this.items[this.items.length - 1];
    return last ? { sequence: last.sequence, hash: last.hash } : null;
  }

  size(): number {
    return this.items.length;
  }

  async records(): Promise<StoredRecord[]> {
    return this.items.map(value => ({ ok: true, value }));
  }

  async entries(): Promise<AuditEntry[]> {
    return [...this.items];
  }
}

interface Offset {
  start: number;
  length: number;
}

function parseLine(line: string): StoredRecord {
  try {
    return { ok: true, value: JSON.parse(line) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

/**
 * Append-only JSONL audit file. Keeps an interaction id → byte offset
 * index so single entries are read without replaying the whole log.
 */
export class JsonlAuditStore implements AuditStore {
  private readonly index = new Map<string, Offset>();
  private last: ChainTail | null = null;
  private bytes = 0;
  private count = 0;

  constructor(private readonly path: string) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  async load(): Promise<void> {
    this.index.clear();
    this.last = null;
    this.bytes = 0;
    this.count = 0;

    if (!existsSync(this.path)) return;

    const content = await readFile(this.path);
    let start = 0;
    while (start < content.length) {
      let end = content.indexOf(0x0a, start);
      if (end === -1) end = content.length;

      const line = content.subarray(start, end).toString('utf-8');
      if (line.trim().length > 0) {
        this.count++;
        const parsed = parseLine(line);
        const fields = parsed.ok ? ChainFieldsSchema.safeParse(parsed.value) : null;
        if (fields?.success) {
          this.index.set(fields.data.interaction_id, { start, length: end - start });
          this.last = { sequence: fields.data.sequence, hash: fields.data.hash };
        }
      }
      start = end + 1;
    }

    this.bytes = (await stat(this.path)).size;
  }

  async append(entry: AuditEntry): Promise<void> {
    const line = JSON.stringify(entry) + '\n';
    try {
      await this.writeLine(line);
    } catch (error) {
      await this.discardPartialWrite(error);
      throw error;
    }

    const length = Buffer.byteLength(line, 'utf-8');
    this.index.set(entry.interaction_id, { start: this.bytes, length: length - 1 });
    this.bytes += length;
    this.count++;
    this.last = { sequence: entry.sequence, hash: entry.hash };
  }

  protected async writeLine(line: string): Promise<void> {
    await appendFile(this.path, line, 'utf-8');
  }

  // A failed append may have left part of a line behind; cut the file back
  // to the last complete entry so the next one starts on a fresh line.
  private async discardPartialWrite(cause: unknown): Promise<void> {
    if (!existsSync(this.path)) return;
    try {
      await truncate(this.path, this.bytes);
    } catch (error) {
      throw new Error(`Failed to discard partial audit write in ${this.path}: ${errorMessage(error)}`, { cause });
    }
  }

  has(interactionId: string): boolean {
    return this.index.has(interactionId);
  }

  async get(interactionId: string): Promise<AuditEntry | null> {
    const offset = this.index.get(interactionId);
    if (!offset) return null;

    const handle = await open(this.path, 'r');
    try {
      const buffer = Buffer.alloc(offset.length);
      await handle.read(buffer, 0, offset.length, offset.start);
      const parsed = parseLine(buffer.toString('utf-8'));
      if (!parsed.ok) return null;
      const entry = AuditEntrySchema.safeParse(parsed.value);
      return entry.success ? entry.data : null;
    } finally {
      await handle.close();
    }
  }

  tail(): ChainTail | null {
    return this.last;
  }

  size(): number {
    return this.count;
  }

  async records(): Promise<StoredRecord[]> {
    if (!existsSync(this.path)) return [];

    const content = await readFile(this.path, 'utf-8');
    return content
      .split('\n')
      .filter(line => line.trim().length > 0)
      .map(parseLine);
  }

  async entries(): Promise<AuditEntry[]> {
    const records = await this.records();
    return records.flatMap(record => {
      if (!record.ok) return [];
      const entry = AuditEntrySchema.safeParse(record.value);
      return entry.success ? [entry.data] : [];
    });
  }
}
