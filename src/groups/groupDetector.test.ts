import { describe, expect, it } from 'vitest';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { createRuntimeLogger } from '../utils/runtimeLogger.js';
import {
  classifyMembershipChange,
  createGroupDetector,
  formatGroupSummary,
  GROUP_DETECTOR_UPDATES,
} from './groupDetector.js';
import { GroupStore } from './groupStore.js';

const logger = createRuntimeLogger({ component: 'test', echoToConsole: false });

const makeDetector = async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'detector-'));
  const store = new GroupStore({
    filePath: path.join(dir, 'detected_groups.json'),
    now: () => new Date('2026-03-01T10:00:00.000Z'),
  });
  await store.load();
  return { store, detector: createGroupDetector({ store, logger }) };
};

const group = { id: -100123, type: 'supergroup', title: 'Мемы' };

describe('classifyMembershipChange', () => {
  it('recognizes additions and removals', () => {
    const change = (oldStatus: string | undefined, newStatus: string) =>
      classifyMembershipChange({
        chat: group,
        old_chat_member: oldStatus ? { status: oldStatus } : undefined,
        new_chat_member: { status: newStatus },
      });

    expect(change('left', 'member')).toBe('bot_added');
    expect(change(undefined, 'administrator')).toBe('bot_added');
    expect(change('administrator', 'left')).toBe('bot_removed');
    expect(change('member', 'kicked')).toBe('ignored');
    expect(change('member', 'administrator')).toBe('ignored');
  });
});

describe('group detector', () => {
  it('records a bot addition and then its removal', async () => {
    const { store, detector } = await makeDetector();

    await detector.handleMyChatMember({
      chat: group,
      old_chat_member: { status: 'left' },
      new_chat_member: { status: 'member' },
    });
    await detector.handleMyChatMember({
      chat: group,
      old_chat_member: { status: 'member' },
      new_chat_member: { status: 'left' },
    });

    expect(store.snapshot().groups['-100123']).toMatchObject({
      event_type: 'bot_added',
      status: 'removed',
      first_detected: '2026-03-01T10:00:00.000Z',
      removed_at: '2026-03-01T10:00:00.000Z',
    });
  });

  it('records group messages only', async () => {
    const { store, detector } = await makeDetector();

    await expect(detector.handleMessage({ id: 42, type: 'private' })).resolves.toBeNull();
    await expect(detector.handleMessage({ id: -9, type: 'channel', title: 'Канал' })).resolves.toBeNull();
    await detector.handleMessage({ id: -5, type: 'group', title: 'Семья' });

    expect(Object.keys(store.snapshot().groups)).toEqual(['-5']);
    expect(store.snapshot().groups['-5'].event_type).toBe('message_received');
  });

  it('routes live updates, including edited messages', async () => {
    const { store, detector } = await makeDetector();
    expect(GROUP_DETECTOR_UPDATES).toEqual(['message', 'edited_message', 'my_chat_member']);

    await detector.handleUpdate({ edited_message: { chat: { id: -5, type: 'group', title: 'Семья' } } });
    await detector.handleUpdate({
      my_chat_member: {
        chat: group,
        old_chat_member: { status: 'left' },
        new_chat_member: { status: 'administrator' },
      },
    });
    await detector.handleUpdate({ message: { chat: { id: 42, type: 'private' } } });

    const groups = store.snapshot().groups;
    expect(Object.keys(groups).sort()).toEqual(['-100123', '-5']);
    expect(groups['-5'].event_type).toBe('message_received');
    expect(groups['-100123'].event_type).toBe('bot_added');
  });

  it('deduplicates chats within a startup scan', async () => {
    const { store, detector } = await makeDetector();

    const found = await detector.scanUpdates([
      { message: { chat: group } },
      { edited_message: { chat: group } },
      { channel_post: { chat: { id: -100999, type: 'channel', title: 'Новости' } } },
      { message: { chat: { id: 42, type: 'private' } } },
      { edited_channel_post: { chat: { id: -5, type: 'group' } } },
      {},
    ]);

    expect(found).toBe(2);
    expect(Object.keys(store.snapshot().groups).sort()).toEqual(['-100123', '-5']);
    expect(store.snapshot().groups['-5'].event_type).toBe('startup_scan');
  });

  it('prints the current groups', async () => {
    const { store, detector } = await makeDetector();
    expect(formatGroupSummary(store.snapshot())).toBe(`📋 Текущие группы:\n${'='.repeat(60)}\nГруппы не найдены`);

    await detector.handleMessage(group);
    const summary = formatGroupSummary(store.snapshot()).split('\n');
    expect(summary.slice(2)).toEqual([
      '✅ Мемы',
      '   ID: -100123',
      '   Тип: supergroup',
      '   Статус: active',
      '   Обнаружено: message_received',
      '   Первое обнаружение: 2026-03-01T10:00:00.000Z',
      '-'.repeat(40),
    ]);
  });
});
