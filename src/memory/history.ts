/**
 * Conversation History
 *
 * Append-only log of prior turns, read back as "most recent N". Only the
 * responder writes to it: one user entry and one assistant entry per turn.
 */

import { clearChatMessages, listRecentChatMessages, storeChatMessage, type ChatRole } from './chat.js';

export interface HistoryEntry {
  role: ChatRole;
  content: string;
}

export interface ConversationHistory {
  appendUser(text: string): void;
  appendAssistant(text: string): void;
  /** Up to `n` most recent entries, oldest first. */
  last(n: number): HistoryEntry[];
  clear(): void;
}

export class InMemoryConversationHistory implements ConversationHistory {
  private readonly entries: HistoryEntry[] = [];

  appendUser(text: string): void {
    this.entries.push({ role: 'user', content: text });
  }

  appendAssistant(text: string): void {
    this.entries.push({ role: 'assistant', content: text });
  }

  last(n: number): HistoryEntry[] {
    const count = Math.max(0, Math.floor(n));
    if (count === 0) return [];
    return this.entries.slice(-count).map((entry) => ({ ...entry }));
  }

  clear(): void {
    this.entries.length = 0;
  }

  get size(): number {
    return this.entries.length;
  }
}

export class SqliteConversationHistory implements ConversationHistory {
  constructor(
    private readonly sessionId: string,
    private readonly dbPath?: string
  ) {}

  appendUser(text: string): void {
    storeChatMessage({ sessionId: this.sessionId, role: 'user', content: text, dbPath: this.dbPath });
  }

  appendAssistant(text: string): void {
    storeChatMessage({
      sessionId: this.sessionId,
      role: 'assistant',
      content: text,
      dbPath: this.dbPath,
    });
  }

  last(n: number): HistoryEntry[] {
    return listRecentChatMessages(this.sessionId, n, this.dbPath).map((record) => ({
      role: record.role,
      content: record.content,
    }));
  }

  clear(): void {
    clearChatMessages(this.sessionId, this.dbPath);
  }
}
