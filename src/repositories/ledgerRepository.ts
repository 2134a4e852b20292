import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

const labelSchema = z.union([z.literal(0), z.literal(1)]);

export const predictionRecordSchema = z.object({
  requestId: z.string().min(1),
  timestamp: z.string().datetime(),
  inputHash: z.string().min(1),
  label: labelSchema,
  probability: z.number().min(0).max(1),
  modelVersion: z.string().min(1)
});

export const outcomeUpdateSchema = z.object({
  requestId: z.string().min(1),
  label: labelSchema,
  timestamp: z.string().datetime()
});

export const ledgerEntrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('prediction'), record: predictionRecordSchema }),
  z.object({ type: z.literal('outcome'), update: outcomeUpdateSchema })
]);

export type PredictionRecord = z.infer<typeof predictionRecordSchema>;
export type OutcomeUpdate = z.infer<typeof outcomeUpdateSchema>;
export type LedgerEntry = z.infer<typeof ledgerEntrySchema>;

export interface LedgerRepository {
  append(entry: LedgerEntry): Promise<void>;
  readAll(): Promise<LedgerEntry[]>;
  /** Replaces the stored log with `entries` (retention compaction). */
  rewrite(entries: readonly LedgerEntry[]): Promise<void>;
}

export class InMemoryLedgerRepository implements LedgerRepository {
  private entries: LedgerEntry[] = [];

  async append(entry: LedgerEntry) {
    this.entries.push(entry);
  }

  async readAll() {
    return [...this.entries];
  }

  async rewrite(entries: readonly LedgerEntry[]) {
    this.entries = [...entries];
  }
}

/**
 * Append-only JSON-lines file. Writes go through a single promise chain so
 * lines never interleave and a compaction rewrite lands between appends,
 * never in the middle of one.
 */
export class JsonlLedgerRepository implements LedgerRepository {
  private queue: Promise<void> = Promise.resolve();

  private ready: Promise<void> | null = null;

  constructor(private readonly filePath: string) {}

  append(entry: LedgerEntry) {
    const line = `${JSON.stringify(entry)}\n`;
    return this.enqueue(async () => {
      await this.ensureDirectory();
      await fs.appendFile(this.filePath, line, 'utf8');
    });
  }

  async readAll() {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const entries: LedgerEntry[] = [];
    let skipped = 0;
    for (const line of content.split('\n')) {
      if (line.trim().length === 0) continue;
      const parsed = safeJson(line);
      const entry = ledgerEntrySchema.safeParse(parsed);
      if (entry.success) {
        entries.push(entry.data);
      } else {
        skipped += 1;
      }
    }
    if (skipped > 0) {
      logger.warn('ledger.replay.skipped_lines', { file: this.filePath, skipped });
    }
    return entries;
  }

  rewrite(entries: readonly LedgerEntry[]) {
    const content = entries.map((entry) => `${JSON.stringify(entry)}\n`).join('');
    return this.enqueue(async () => {
      await this.ensureDirectory();
      const tmp = `${this.filePath}.${process.pid}.tmp`;
      await fs.writeFile(tmp, content, 'utf8');
      await fs.rename(tmp, this.filePath);
    });
  }

  private ensureDirectory() {
    this.ready ??= fs.mkdir(path.dirname(this.filePath), { recursive: true }).then(
      () => undefined,
      (error: unknown) => {
        this.ready = null;
        throw error;
      }
    );
    return this.ready;
  }

  private enqueue(task: () => Promise<void>) {
    const run = this.queue.then(task);
    // the chain continues after a failed write; the caller still sees the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }
}

function safeJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

function isMissingFile(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
