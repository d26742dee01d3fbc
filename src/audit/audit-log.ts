import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import type {
  AuditEntry,
  AuditRange,
  AuditVerification,
  CostRecord,
  Interaction,
  PolicyDecision,
  RiskAssessment,
  UnhashedAuditEntry
} from '../types/index.js';
import { AuditWriteError, DuplicateAuditEntryError } from '../errors.js';
import { GENESIS_HASH, HashChain } from '../crypto/hasher.js';
import { auditSignaturePayload, keyId, signData, verifySignature, type KeyPair } from '../crypto/signer.js';
import { ChainFieldsSchema } from './schema.js';
import type { AuditStore } from './store.js';

export interface AuditLogOptions {
  /** Signs each entry when set; the public half is used by verify. */
  keyPair?: KeyPair | null;
}

function withoutSeal(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([key]) => key !== 'hash' && key !== 'signature'));
}

function inRange(sequence: number, range: AuditRange): boolean {
  return (range.from === undefined || sequence >= range.from) && (range.to === undefined || sequence <= range.to);
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tamper-evident log of governed interactions.
 *
 * Each entry hashes its predecessor's hash together with its own canonical
 * JSON. Appends run one at a time through a promise queue; the chain tail
 * moves only after the store has accepted the write.
 */
export class AuditLog {
  private chain: HashChain;
  private sequence: number;
  private queue: Promise<void> = Promise.resolve();
  private readonly inFlight = new Set<string>();
  private readonly keyPair: KeyPair | null;

  private constructor(
    private readonly store: AuditStore,
    options: AuditLogOptions,
    private readonly logger: Logger
  ) {
    const tail = store.tail();
    this.chain = new HashChain(tail?.hash);
    this.sequence = tail?.sequence ?? 0;
    this.keyPair = options.keyPair ?? null;
  }

  static async open(store: AuditStore, options: AuditLogOptions, logger: Logger): Promise<AuditLog> {
    await store.load();
    const log = new AuditLog(store, options, logger);
    logger.info({ entries: store.size(), tail: log.chain.getCurrentHash(), key_id: log.keyId }, 'Audit log opened');
    return log;
  }

  get signed(): boolean {
    return this.keyPair !== null;
  }

  get keyId(): string | null {
    return this.keyPair ? keyId(this.keyPair.publicKey) : null;
  }

  size(): number {
    return this.store.size();
  }

  has(interactionId: string): boolean {
    return this.store.has(interactionId);
  }

  get(interactionId: string): Promise<AuditEntry | null> {
    return this.store.get(interactionId);
  }

  entries(): Promise<AuditEntry[]> {
    return this.store.entries();
  }

  append(
    interaction: Interaction,
    assessment: RiskAssessment,
    decision: PolicyDecision,
    cost: CostRecord
  ): Promise<AuditEntry> {
    const interactionId = interaction.interaction_id;

    const ids = [assessment.interaction_id, decision.interaction_id, cost.interaction_id];
    if (ids.some(id => id !== interactionId)) {
      return Promise.reject(new AuditWriteError('Audit tuple refers to more than one interaction', interactionId));
    }

    if (this.store.has(interactionId) || this.inFlight.has(interactionId)) {
      return Promise.reject(new DuplicateAuditEntryError(interactionId));
    }

    this.inFlight.add(interactionId);
    const run = this.queue.then(() => this.write(interaction, assessment, decision, cost));
    // Ordering only; the caller observes the outcome through `run`
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run.finally(() => this.inFlight.delete(interactionId));
  }

  async verify(range: AuditRange = {}): Promise<boolean> {
    return (await this.inspect(range)).valid;
  }

  /**
   * Recomputes every hash in write order and checks links, sequence
   * numbers and signatures. Only entries inside `range` are reported, but
   * links are always followed from the genesis entry.
   */
  async inspect(range: AuditRange = {}): Promise<AuditVerification> {
    const records = await this.store.records();
    const errors: string[] = [];
    let checked = 0;
    let prevHash: string | null = GENESIS_HASH;

    for (let i = 0; i < records.length; i++) {
      const expectedSequence = i + 1;
      const record = records[i];
      const reporting = inRange(expectedSequence, range);

      if (!record.ok) {
        if (reporting) errors.push(`Entry ${expectedSequence}: invalid JSON (${record.error})`);
        prevHash = null;
        continue;
      }

      const fields = ChainFieldsSchema.safeParse(record.value);
      if (!fields.success || !isObject(record.value)) {
        if (reporting) errors.push(`Entry ${expectedSequence}: missing chain fields`);
        prevHash = null;
        continue;
      }

      const { sequence, interaction_id, prev_hash, hash, signature } = fields.data;

      if (reporting) {
        checked++;

        if (sequence !== expectedSequence) {
          errors.push(`Entry ${expectedSequence}: sequence ${sequence} out of order`);
        }
        if (prevHash !== null && prev_hash !== prevHash) {
          errors.push(`Entry ${expectedSequence}: chain broken, expected prev_hash ${prevHash}, got ${prev_hash}`);
        }
        if (!HashChain.verifyRecord(withoutSeal(record.value), prev_hash, hash)) {
          errors.push(`Entry ${expectedSequence}: hash mismatch`);
        }
        if (this.keyPair) {
          const payload = auditSignaturePayload({ sequence, interaction_id, hash });
          if (signature === undefined) {
            errors.push(`Entry ${expectedSequence}: missing signature`);
          } else if (!verifySignature(payload, signature, this.keyPair.publicKey)) {
            errors.push(`Entry ${expectedSequence}: invalid signature`);
          }
        }
      }

      prevHash = hash;
    }

    return { valid: errors.length === 0, checked, errors };
  }

  private async write(
    interaction: Interaction,
    assessment: RiskAssessment,
    decision: PolicyDecision,
    cost: CostRecord
  ): Promise<AuditEntry> {
    const prevHash = this.chain.getCurrentHash();
    const unhashed: UnhashedAuditEntry = {
      sequence: this.sequence + 1,
      entry_id: uuidv4(),
      interaction_id: interaction.interaction_id,
      recorded_at: new Date().toISOString(),
      interaction,
      assessment,
      decision,
      cost,
      prev_hash: prevHash
    };

    const hash = HashChain.chainHash(prevHash, unhashed);
    const entry: AuditEntry = {
      ...unhashed,
      hash,
      ...(this.keyPair
        ? { signature: signData(auditSignaturePayload({ sequence: unhashed.sequence, interaction_id: unhashed.interaction_id, hash }), this.keyPair.privateKey) }
        : {})
    };

    try {
      await this.store.append(Object.freeze(entry));
    } catch (error) {
      this.logger.error(
        { interaction_id: interaction.interaction_id, sequence: entry.sequence, err: error },
        'Audit store write failed'
      );
      throw new AuditWriteError('Failed to persist audit entry', interaction.interaction_id, error);
    }

    this.chain.advance(hash);
    this.sequence = entry.sequence;
    return entry;
  }
}
