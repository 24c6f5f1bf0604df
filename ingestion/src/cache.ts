import { createHash, randomUUID } from "crypto";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { createScopedLogger, extractErrorMessage, type Logger } from "poster-engine";

const CacheEnvelope = z.object({
  key: z.string(),
  timestamp: z.string(),
  payload: z.unknown(),
});

/** Any zod schema whose output is `T`, whatever its input. */
export type CacheSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface CacheEntry<T> {
  key: string;
  payload: T;
  timestamp: string;
}

export interface CacheStore {
  get<T>(key: string, schema: CacheSchema<T>): Promise<T | undefined>;
  put<T>(key: string, payload: T): Promise<void>;
  clear(): Promise<void>;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/** File name for a key: readable prefix plus a hash so distinct keys never collide. */
export function cacheFileName(key: string): string {
  const readable = key.replace(/[^A-Za-z0-9._-]+/g, "_").slice(0, 80);
  const digest = createHash("sha1").update(key).digest("hex").slice(0, 12);
  return `${readable}-${digest}.json`;
}

/**
 * One JSON document per key. Writes go to a temporary file renamed over the
 * entry, so readers see the old entry or the new one and never a partial write.
 */
export class CacheManager implements CacheStore {
  private readonly dir: string;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(dir: string, options: { logger?: Logger; now?: () => Date } = {}) {
    this.dir = dir;
    this.log = options.logger ?? createScopedLogger({ component: "cache" });
    this.now = options.now ?? (() => new Date());
  }

  get directory(): string {
    return this.dir;
  }

  async entry<T>(key: string, schema: CacheSchema<T>): Promise<CacheEntry<T> | undefined> {
    const file = path.join(this.dir, cacheFileName(key));
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (error) {
      if (!isMissing(error)) {
        this.log.warn({ key, err: extractErrorMessage(error) }, "unreadable cache entry, treating as a miss");
      }
      return undefined;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      this.log.warn({ key, err: extractErrorMessage(error) }, "ignoring corrupt cache entry");
      return undefined;
    }
    const envelope = CacheEnvelope.safeParse(raw);
    if (!envelope.success || envelope.data.key !== key) {
      this.log.warn({ key }, "ignoring cache entry with unexpected shape");
      return undefined;
    }
    const payload = schema.safeParse(envelope.data.payload);
    if (!payload.success) {
      this.log.warn({ key }, "ignoring cache entry whose payload failed validation");
      return undefined;
    }
    this.log.debug({ key }, "cache hit");
    return { key, payload: payload.data, timestamp: envelope.data.timestamp };
  }

  async get<T>(key: string, schema: CacheSchema<T>): Promise<T | undefined> {
    const found = await this.entry(key, schema);
    return found?.payload;
  }

  async has(key: string): Promise<boolean> {
    return (await this.entry(key, z.unknown())) !== undefined;
  }

  async put<T>(key: string, payload: T): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const file = path.join(this.dir, cacheFileName(key));
    const temp = `${file}.${randomUUID()}.tmp`;
    const entry: CacheEntry<T> = { key, payload, timestamp: this.now().toISOString() };
    try {
      await writeFile(temp, JSON.stringify(entry), "utf8");
      await rename(temp, file);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }

  async clear(): Promise<void> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (isMissing(error)) return;
      throw error;
    }
    await Promise.all(
      entries.filter((name) => name.endsWith(".json")).map((name) => rm(path.join(this.dir, name), { force: true }))
    );
  }
}
