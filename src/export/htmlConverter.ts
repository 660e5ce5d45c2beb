import * as cheerio from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';

export const HTML_EXPORT_SOURCE = 'telegram_html_export';

export type HtmlExportItem = {
  messageId: string | null;
  sender: string;
  time: string;
  text: string;
};

export type HtmlExportRecord = {
  content: string;
  metadata: {
    message_id: string | null;
    sender: string;
    time: string;
    source: typeof HTML_EXPORT_SOURCE;
  };
};

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const value = node.data.trim();
    if (value) parts.push(value);
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, parts);
  }
}

/** Every text node under the element, trimmed, joined with single spaces. */
export function textOf(node: AnyNode | undefined): string {
  if (!node) return '';
  const parts: string[] = [];
  collectText(node, parts);
  return parts.join(' ');
}

/** Parses a chat page saved from Telegram Web; messages without text are left out. */
export function convertHtmlExport(html: string): HtmlExportItem[] {
  const $ = cheerio.load(html);
  const items: HtmlExportItem[] = [];

  for (const element of $('div.message-list-item').toArray()) {
    const message = $(element);
    const text = textOf(message.find('.text-content, .text').get(0));
    if (!text) continue;

    items.push({
      messageId: message.attr('data-message-id') ?? null,
      sender: textOf(message.find('.sender-title, .from_name').get(0)),
      time: textOf(message.find('.message-time, .date').get(0)),
      text,
    });
  }

  return items;
}

export function renderMarkdown(items: readonly HtmlExportItem[]): string {
  return items.map((item) => `[${item.time}] ${item.sender}: ${item.text}\n`).join('');
}

export function toHtmlExportRecord(item: HtmlExportItem): HtmlExportRecord {
  return {
    content: `${item.sender}: ${item.text}`,
    metadata: {
      message_id: item.messageId,
      sender: item.sender,
      time: item.time,
      source: HTML_EXPORT_SOURCE,
    },
  };
}

export function renderJsonl(items: readonly HtmlExportItem[]): string {
  return items.map((item) => JSON.stringify(toHtmlExportRecord(item)) + '\n').join('');
}
