import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';

export type TerminalState = 'Succeeded' | 'Failed';

const checkpointRecordSchema = z.object({
  imagePath: z.string().min(1),
  terminalState: z.enum(['Succeeded', 'Failed']),
  attemptCount: z.number().int().min(0),
  timestamp: z.string(),
  errorKind: z.enum(['Transient', 'RateLimited', 'AuthFailure', 'InvalidInput', 'Unknown']).optional(),
  errorMessage: z.string().optional(),
  caption: z
    .object({
      rawText: z.string(),
      providerId: z.string(),
      modelName: z.string(),
      latencyMs: z.number(),
    })
    .optional(),
});

export type CheckpointRecord = z.infer<typeof checkpointRecordSchema>;

/**
 * Append-only log of terminal transitions, one JSON object per line.
 *
 * Appends are chained on a single promise so concurrent workers never interleave
 * partial lines; the last record for a path wins when the log is replayed.
 */
export class CheckpointStore {
  private tail: Promise<void> = Promise.resolve();
  private records = new Map<string, CheckpointRecord>();

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<Map<string, CheckpointRecord>> {
    this.records = new Map();
    if (!(await fs.pathExists(this.filePath))) {
      return new Map(this.records);
    }

    const content = await fs.readFile(this.filePath, 'utf-8');
    const lines = content.split('\n');
    lines.forEach((line, index) => {
      if (!line.trim()) return;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        // A crash mid-append leaves at most one truncated trailing line
        logger.warn(`Skipping unreadable checkpoint line ${index + 1} in ${this.filePath}`);
        return;
      }
      const result = checkpointRecordSchema.safeParse(parsed);
      if (!result.success) {
        logger.warn(`Skipping malformed checkpoint line ${index + 1} in ${this.filePath}`);
        return;
      }
      this.records.set(result.data.imagePath, result.data);
    });

    logger.debug(`Loaded ${this.records.size} checkpoint record(s) from ${this.filePath}`);
    return new Map(this.records);
  }

  get(imagePath: string): CheckpointRecord | undefined {
    return this.records.get(imagePath);
  }

  append(record: CheckpointRecord): Promise<void> {
    const line = JSON.stringify(record) + '\n';
    const write = this.tail.then(async () => {
      await fs.ensureDir(path.dirname(this.filePath));
      await fs.appendFile(this.filePath, line, 'utf-8');
      this.records.set(record.imagePath, record);
    });
    // The caller of append() sees the failure; later appends still run
    this.tail = write.catch((error) => {
      logger.error(`Checkpoint append failed for ${record.imagePath}: ${error}`);
    });
    return write;
  }

  /** Resolves once every append issued so far has been written. */
  flush(): Promise<void> {
    return this.tail;
  }
}
