import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

export const UNTITLED_GROUP = 'Без названия';

const GroupEventTypeSchema = z.enum(['bot_added', 'message_received', 'startup_scan']);

const GroupRecordSchema = z.object({
  id: z.number(),
  title: z.string(),
  type: z.string(),
  first_detected: z.string(),
  last_activity: z.string(),
  event_type: GroupEventTypeSchema,
  status: z.enum(['active', 'removed']),
  removed_at: z.string().optional(),
});

const GroupsFileSchema = z.object({
  groups: z.record(GroupRecordSchema),
  last_updated: z.string().nullable(),
});

export type GroupEventType = z.infer<typeof GroupEventTypeSchema>;
export type GroupRecord = z.infer<typeof GroupRecordSchema>;
export type GroupsFile = z.infer<typeof GroupsFileSchema>;

export type GroupSighting = {
  id: number;
  title?: string;
  type: string;
};

export type GroupStoreOptions = {
  filePath: string;
  now?: () => Date;
};

const emptyGroupsFile = (): GroupsFile => ({ groups: {}, last_updated: null });

/**
 * Owns `detected_groups.json`. Mutations run one at a time on a promise chain and each one rewrites
 * the whole file.
 */
export class GroupStore {
  private readonly filePath: string;
  private readonly now: () => Date;
  private data: GroupsFile = emptyGroupsFile();
  private queue: Promise<void> = Promise.resolve();

  constructor(options: GroupStoreOptions) {
    this.filePath = options.filePath;
    this.now = options.now ?? (() => new Date());
  }

  /** A missing or malformed file starts an empty store; other read errors propagate. */
  async load(): Promise<GroupsFile> {
    this.data = await readGroupsFile(this.filePath);
    return this.snapshot();
  }

  snapshot(): GroupsFile {
    return structuredClone(this.data);
  }

  recordSighting(sighting: GroupSighting, eventType: GroupEventType): Promise<GroupRecord> {
    return this.mutate(() => {
      const key = String(sighting.id);
      const timestamp = this.now().toISOString();
      const existing = this.data.groups[key];

      const record: GroupRecord = {
        id: sighting.id,
        title: sighting.title || UNTITLED_GROUP,
        type: sighting.type,
        first_detected: existing?.first_detected ?? timestamp,
        last_activity: timestamp,
        event_type: eventType,
        status: 'active',
      };
      this.data.groups[key] = record;
      return record;
    });
  }

  /** Returns null, and leaves the file untouched, for a chat that was never recorded. */
  markRemoved(chatId: number): Promise<GroupRecord | null> {
    return this.mutate(() => {
      const existing = this.data.groups[String(chatId)];
      if (!existing) return null;

      const record: GroupRecord = { ...existing, status: 'removed', removed_at: this.now().toISOString() };
      this.data.groups[String(chatId)] = record;
      return record;
    });
  }

  private mutate<T>(apply: () => T): Promise<T> {
    const run = this.queue.then(async () => {
      const result = apply();
      if (result === null) return result;

      this.data.last_updated = this.now().toISOString();
      await writeGroupsFile(this.filePath, this.data);
      return result;
    });

    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

async function readGroupsFile(filePath: string): Promise<GroupsFile> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return emptyGroupsFile();
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return emptyGroupsFile();
  }

  const res = GroupsFileSchema.safeParse(parsed);
  return res.success ? res.data : emptyGroupsFile();
}

async function writeGroupsFile(filePath: string, data: GroupsFile): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
}
