import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

export type EventLogRecord = {
  ts: string;
  type:
    | 'telegram.update'
    | 'explain.run.start'
    | 'explain.run.success'
    | 'explain.run.error'
    | 'explain.not_found';
  data: Record<string, unknown>;
};

export async function appendJsonl(path: string, record: EventLogRecord) {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(record) + '\n', 'utf8');
}
