import fs from 'fs-extra';
import path from 'path';
import { pipeline } from 'stream/promises';

export interface CopyProgress {
  id: string;
  source: string;
  destination: string;
  copiedBytes: number;
  totalBytes: number;
  /** 0 to 100 */
  percent: number;
  done: boolean;
  error: string | null;
}

const DEFAULT_CHUNK_BYTES = 1024 * 1024;
const DEFAULT_MAX_RECORDS = 200;

/**
 * Progress records for running copies, polled by id from a separate request.
 * A finished record is dropped once it has been read with `take`, and the
 * oldest finished records go first when more than `maxRecords` are held.
 */
export class CopyProgressRegistry {
  private readonly records = new Map<string, CopyProgress>();
  private lastStamp = 0;

  constructor(private readonly maxRecords: number = DEFAULT_MAX_RECORDS) {}

  /** Ids are `copy_<ms>`, bumped when two copies start in the same millisecond. */
  nextId(now: number = Date.now()): string {
    const stamp = now > this.lastStamp ? now : this.lastStamp + 1;
    this.lastStamp = stamp;
    return `copy_${stamp}`;
  }

  get(id: string): CopyProgress | null {
    return this.records.get(id) ?? null;
  }

  /** Read a record, forgetting it when the copy has finished. */
  take(id: string): CopyProgress | null {
    const record = this.get(id);
    if (record?.done) this.records.delete(id);
    return record;
  }

  set(record: CopyProgress): void {
    this.records.delete(record.id);
    this.records.set(record.id, record);
    this.evict();
  }

  delete(id: string): void {
    this.records.delete(id);
  }

  get size(): number {
    return this.records.size;
  }

  private evict(): void {
    for (const [id, record] of this.records) {
      if (this.records.size <= this.maxRecords) return;
      if (record.done) this.records.delete(id);
    }
  }
}

export interface CopyOptions {
  chunkBytes?: number;
  operationId?: string;
}

/**
 * Copy `source` to `destination` in chunks, updating the registry as bytes land.
 * The record is left in place (done, or with an error) for the final poll.
 * A failed copy removes whatever part of `destination` it wrote.
 */
export async function copyWithProgress(
  registry: CopyProgressRegistry,
  source: string,
  destination: string,
  options: CopyOptions = {}
): Promise<CopyProgress> {
  const id = options.operationId ?? registry.nextId();
  const { size } = await fs.stat(source);
  const record: CopyProgress = {
    id,
    source,
    destination,
    copiedBytes: 0,
    totalBytes: size,
    percent: size === 0 ? 100 : 0,
    done: false,
    error: null,
  };
  registry.set(record);

  await fs.ensureDir(path.dirname(destination));
  const preexisting = await fs.pathExists(destination);
  const reader = fs.createReadStream(source, { highWaterMark: options.chunkBytes ?? DEFAULT_CHUNK_BYTES });
  reader.on('data', chunk => {
    record.copiedBytes += chunk.length;
    record.percent = size === 0 ? 100 : Math.min(100, Math.floor((record.copiedBytes / size) * 100));
  });

  try {
    await pipeline(reader, fs.createWriteStream(destination));
  } catch (error) {
    record.error = error instanceof Error ? error.message : String(error);
    record.done = true;
    if (!preexisting) await fs.remove(destination);
    throw error;
  }

  record.percent = 100;
  record.done = true;
  return record;
}
