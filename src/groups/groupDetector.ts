import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import type { GroupRecord, GroupsFile, GroupStore } from './groupStore.js';

export type ChatLike = {
  id: number;
  type: string;
  title?: string;
};

export type MyChatMemberUpdate = {
  chat: ChatLike;
  old_chat_member?: { status: string };
  new_chat_member: { status: string };
};

export type ScannableUpdate = {
  message?: { chat: ChatLike };
  edited_message?: { chat: ChatLike };
  channel_post?: { chat: ChatLike };
  edited_channel_post?: { chat: ChatLike };
};

export type LiveUpdate = {
  message?: { chat: ChatLike };
  edited_message?: { chat: ChatLike };
  my_chat_member?: MyChatMemberUpdate;
};

/** Update types the detector polls for; each one is routed by `handleUpdate`. */
export const GROUP_DETECTOR_UPDATES = ['message', 'edited_message', 'my_chat_member'] as const;

export type MembershipChange = 'bot_added' | 'bot_removed' | 'ignored';

export type GroupDetector = {
  handleMyChatMember: (update: MyChatMemberUpdate) => Promise<MembershipChange>;
  handleMessage: (chat: ChatLike) => Promise<GroupRecord | null>;
  scanUpdates: (updates: readonly ScannableUpdate[]) => Promise<number>;
  handleUpdate: (update: LiveUpdate) => Promise<void>;
};

const GROUP_CHAT_TYPES = new Set(['group', 'supergroup']);
const JOINED_STATUSES = new Set(['member', 'administrator']);
const ABSENT_STATUSES = new Set(['left', 'none']);

export const isGroupChat = (chat: ChatLike) => GROUP_CHAT_TYPES.has(chat.type);

export function classifyMembershipChange(update: MyChatMemberUpdate): MembershipChange {
  const oldStatus = update.old_chat_member?.status ?? 'none';
  const newStatus = update.new_chat_member.status;

  if (ABSENT_STATUSES.has(oldStatus) && JOINED_STATUSES.has(newStatus)) return 'bot_added';
  if (JOINED_STATUSES.has(oldStatus) && newStatus === 'left') return 'bot_removed';
  return 'ignored';
}

function chatOfUpdate(update: ScannableUpdate): ChatLike | null {
  return (
    update.message?.chat ??
    update.edited_message?.chat ??
    update.channel_post?.chat ??
    update.edited_channel_post?.chat ??
    null
  );
}

export function createGroupDetector(options: { store: GroupStore; logger: RuntimeLogger }): GroupDetector {
  const { store, logger } = options;

  const handleMyChatMember = async (update: MyChatMemberUpdate): Promise<MembershipChange> => {
    const change = classifyMembershipChange(update);
    const { chat } = update;

    if (change === 'bot_added') {
      await store.recordSighting({ id: chat.id, title: chat.title, type: chat.type }, 'bot_added');
      logger.info('group.bot_added', { chatId: chat.id, title: chat.title ?? null });
    } else if (change === 'bot_removed') {
      const record = await store.markRemoved(chat.id);
      logger.info('group.bot_removed', { chatId: chat.id, title: chat.title ?? null, known: record !== null });
    }
    return change;
  };

  const handleMessage = async (chat: ChatLike): Promise<GroupRecord | null> => {
    if (!isGroupChat(chat)) return null;
    return store.recordSighting({ id: chat.id, title: chat.title, type: chat.type }, 'message_received');
  };

  const scanUpdates = async (updates: readonly ScannableUpdate[]): Promise<number> => {
    const seen = new Set<number>();
    for (const update of updates) {
      const chat = chatOfUpdate(update);
      if (!chat || !isGroupChat(chat) || seen.has(chat.id)) continue;

      seen.add(chat.id);
      await store.recordSighting({ id: chat.id, title: chat.title, type: chat.type }, 'startup_scan');
    }
    logger.info('group.startup_scan', { updates: updates.length, groups: seen.size });
    return seen.size;
  };

  const handleUpdate = async (update: LiveUpdate): Promise<void> => {
    if (update.my_chat_member) {
      await handleMyChatMember(update.my_chat_member);
      return;
    }
    const chat = update.message?.chat ?? update.edited_message?.chat;
    if (chat) await handleMessage(chat);
  };

  return { handleMyChatMember, handleMessage, scanUpdates, handleUpdate };
}

export function formatGroupSummary(data: GroupsFile): string {
  const records = Object.values(data.groups);
  const lines = ['📋 Текущие группы:', '='.repeat(60)];
  if (records.length === 0) {
    lines.push('Группы не найдены');
    return lines.join('\n');
  }

  for (const record of records) {
    lines.push(`${record.status === 'active' ? '✅' : '❌'} ${record.title}`);
    lines.push(`   ID: ${record.id}`);
    lines.push(`   Тип: ${record.type}`);
    lines.push(`   Статус: ${record.status}`);
    lines.push(`   Обнаружено: ${record.event_type}`);
    lines.push(`   Первое обнаружение: ${record.first_detected}`);
    if (record.removed_at) lines.push(`   Удален: ${record.removed_at}`);
    lines.push('-'.repeat(40));
  }
  return lines.join('\n');
}
