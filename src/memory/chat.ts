import { randomUUID } from 'node:crypto';

import { openDatabase } from './db.js';

export type ChatRole = 'user' | 'assistant';

export interface ChatMessageRecord {
  id: string;
  sessionId: string;
  role: ChatRole;
  content: string;
  createdAt: string;
}

interface ChatMessageRow {
  id: string;
  sessionId: string;
  role: string;
  content: string;
  createdAt: string;
}

function toRecord(row: ChatMessageRow): ChatMessageRecord {
  return {
    id: row.id,
    sessionId: row.sessionId,
    role: row.role === 'assistant' ? 'assistant' : 'user',
    content: row.content,
    createdAt: row.createdAt,
  };
}

export function storeChatMessage(params: {
  sessionId: string;
  role: ChatRole;
  content: string;
  createdAt?: string;
  dbPath?: string;
}): string {
  const db = openDatabase(params.dbPath);
  const id = randomUUID();
  const createdAt = params.createdAt ?? new Date().toISOString();

  db.prepare(
    `
      INSERT INTO chat_messages (id, session_id, role, content, created_at)
      VALUES (@id, @sessionId, @role, @content, @createdAt)
    `
  ).run({
    id,
    sessionId: params.sessionId,
    role: params.role,
    content: params.content,
    createdAt,
  });

  return id;
}

/**
 * The most recent `limit` messages of a session, oldest first.
 */
export function listRecentChatMessages(
  sessionId: string,
  limit: number,
  dbPath?: string
): ChatMessageRecord[] {
  const count = Math.max(0, Math.floor(limit));
  if (count === 0) {
    return [];
  }
  const db = openDatabase(dbPath);
  const rows = db
    .prepare<[string, number], ChatMessageRow>(
      `
        SELECT id, session_id as sessionId, role, content, created_at as createdAt
        FROM (
          SELECT * FROM chat_messages
          WHERE session_id = ?
          ORDER BY seq DESC
          LIMIT ?
        )
        ORDER BY seq ASC
      `
    )
    .all(sessionId, count);
  return rows.map(toRecord);
}

export function countChatMessages(sessionId: string, dbPath?: string): number {
  const db = openDatabase(dbPath);
  const row = db
    .prepare<[string], { total: number }>(
      `SELECT COUNT(*) as total FROM chat_messages WHERE session_id = ?`
    )
    .get(sessionId);
  return row?.total ?? 0;
}

export function clearChatMessages(sessionId: string, dbPath?: string): number {
  const db = openDatabase(dbPath);
  const result = db.prepare(`DELETE FROM chat_messages WHERE session_id = ?`).run(sessionId);
  return result.changes;
}

/**
 * Delete messages older than the retention window. Returns the number removed.
 */
export function pruneChatMessages(retentionDays: number, dbPath?: string, now: Date = new Date()): number {
  const days = Math.max(1, Math.floor(retentionDays));
  const cutoff = new Date(now.getTime() - days * 24 * 60 * 60 * 1000).toISOString();
  const db = openDatabase(dbPath);
  const result = db.prepare(`DELETE FROM chat_messages WHERE created_at < ?`).run(cutoff);
  return result.changes;
}
