import { existsSync, mkdirSync } from 'fs';
import { appendFile, readFile } from 'fs/promises';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { FeedbackInput, FeedbackRecord } from '../types/index.js';

export const FeedbackInputSchema = z.object({
  interaction_id: z.string().min(1),
  rating: z.number().int().min(1).max(5),
  feedback_type: z.enum(['positive', 'negative', 'neutral']),
  label: z.enum(['safe', 'unsafe']).optional(),
  comment: z.string().max(4000).optional(),
  tags: z.array(z.string().max(64)).max(32).optional()
});

const FeedbackRecordSchema = FeedbackInputSchema.extend({
  feedback_id: z.string(),
  tags: z.array(z.string()),
  submitted_at: z.string()
});

export interface FeedbackStore {
  load(): Promise<void>;
  add(input: FeedbackInput): Promise<FeedbackRecord>;
  list(): FeedbackRecord[];
  forInteraction(interactionId: string): FeedbackRecord[];
}

function toRecord(input: FeedbackInput): FeedbackRecord {
  return Object.freeze({
    feedback_id: uuidv4(),
    interaction_id: input.interaction_id,
    rating: input.rating,
    feedback_type: input.feedback_type,
    ...(input.label !== undefined ? { label: input.label } : {}),
    ...(input.comment !== undefined ? { comment: input.comment } : {}),
    tags: Object.freeze([...(input.tags ?? [])]),
    submitted_at: new Date().toISOString()
  });
}

export class MemoryFeedbackStore implements FeedbackStore {
  protected readonly items: FeedbackRecord[] = [];

  async load(): Promise<void> {
    // nothing persisted
  }

  async add(input: FeedbackInput): Promise<FeedbackRecord> {
    const record = toRecord(input);
    this.items.push(record);
    return record;
  }

  list(): FeedbackRecord[] {
    return [...this.items];
  }

  forInteraction(interactionId: string): FeedbackRecord[] {
    return this.items.filter(item => item.interaction_id === interactionId);
  }
}

/** Feedback kept in memory and mirrored to an append-only JSONL file. */
export class JsonlFeedbackStore extends MemoryFeedbackStore {
  constructor(private readonly path: string) {
    super();
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  override async load(): Promise<void> {
    this.items.length = 0;
    if (!existsSync(this.path)) return;

    const content = await readFile(this.path, 'utf-8');
    for (const [index, line] of content.split('\n').entries()) {
      if (line.trim().length === 0) continue;
      const parsed = FeedbackRecordSchema.safeParse(JSON.parse(line));
      if (!parsed.success) {
        throw new Error(`Invalid feedback record on line ${index + 1} of ${this.path}`);
      }
      this.items.push(Object.freeze({ ...parsed.data, tags: Object.freeze(parsed.data.tags) }));
    }
  }

  override async add(input: FeedbackInput): Promise<FeedbackRecord> {
    const record = toRecord(input);
    await appendFile(this.path, JSON.stringify(record) + '\n', 'utf-8');
    this.items.push(record);
    return record;
  }
}
