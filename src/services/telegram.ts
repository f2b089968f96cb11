import type { Api } from 'grammy';
import type { AlertDispatcher, AlertEvent } from '../market/types.js';
import { formatAlert } from '../market/format.js';

export type SendMarkdown = (chatId: number, text: string) => Promise<unknown>;

export function markdownSender(api: Api): SendMarkdown {
  return (chatId, text) => api.sendMessage(chatId, text, { parse_mode: 'Markdown' });
}

/**
 * Sends every alert to each current recipient. One failing chat does not stop
 * the others; the combined failure is re-thrown so the watcher can log it.
 */
export class TelegramAlertDispatcher implements AlertDispatcher {
  constructor(
    private readonly send: SendMarkdown,
    private readonly recipients: () => Iterable<number>
  ) {}

  async deliver(event: AlertEvent): Promise<void> {
    const text = formatAlert(event);
    const chatIds = new Set(this.recipients());
    const errors: unknown[] = [];

    for (const chatId of chatIds) {
      try {
        await this.send(chatId, text);
      } catch (e) {
        errors.push(e);
      }
    }

    if (errors.length) {
      throw new AggregateError(
        errors,
        `Alert delivery failed for ${errors.length}/${chatIds.size} chats`
      );
    }
  }
}
