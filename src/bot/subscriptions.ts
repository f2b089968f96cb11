// Chats that receive alerts. The admin chat always does, subscribed or not.
export class Subscriptions {
  private readonly chats = new Set<number>();

  constructor(private readonly adminChatId: number) {}

  subscribe(chatId: number): void {
    this.chats.add(chatId);
  }

  unsubscribe(chatId: number): void {
    this.chats.delete(chatId);
  }

  get size(): number {
    return this.chats.size;
  }

  recipients(): number[] {
    return [this.adminChatId, ...this.chats];
  }

  // /stop halts the watcher only from the admin chat, and only once nobody else listens
  shouldStopWatcher(chatId: number): boolean {
    return chatId === this.adminChatId && this.chats.size === 0;
  }
}
