import type { RowDataPacket } from 'mysql2/promise';
import { execute, query } from '../db/index.js';
import type { SqlValue } from '../db/index.js';
import { Message, serializeMessage } from '../messages/message.js';
import type { SerializedMessage } from '../types/index.js';

interface MessageRow extends RowDataPacket {
  id: number;
  controller_name: string;
  content: string;
  read_state: string | null;
  created_at: Date | string;
}

export type Execute = (sql: string, params: SqlValue[]) => Promise<unknown>;

/**
 * Insert a batch of messages into controller_messages
 */
export async function saveMessages(messages: readonly Message[], exec: Execute = execute): Promise<void> {
  if (messages.length === 0) {
    return;
  }

  const placeholders = messages.map(() => '(?, ?, ?, ?)').join(', ');
  const params = messages.flatMap((m) => [m.name, m.content, m.readState ?? null, formatDateTime(m.timestamp)]);

  await exec(
    `INSERT INTO controller_messages (controller_name, content, read_state, created_at)
     VALUES ${placeholders}`,
    params
  );
}

/**
 * Stored messages, newest first, optionally for one controller
 */
export async function getMessageHistory(name: string | undefined, limit: number): Promise<SerializedMessage[]> {
  const clampedLimit = Math.min(Math.max(Math.floor(limit), 1), 1000);

  const rows = name
    ? await query<MessageRow[]>(
        `SELECT id, controller_name, content, read_state, created_at
         FROM controller_messages
         WHERE controller_name = ?
         ORDER BY created_at DESC, id DESC
         LIMIT ${clampedLimit}`,
        [name]
      )
    : await query<MessageRow[]>(
        `SELECT id, controller_name, content, read_state, created_at
         FROM controller_messages
         ORDER BY created_at DESC, id DESC
         LIMIT ${clampedLimit}`
      );

  return rows.map(toSerialized);
}

function toSerialized(row: MessageRow): SerializedMessage {
  const timestamp = row.created_at instanceof Date ? row.created_at : new Date(`${row.created_at.replace(' ', 'T')}Z`);
  return serializeMessage(new Message(row.controller_name, row.content, timestamp, row.read_state ?? undefined));
}

/**
 * Format a Date for MySQL (UTC)
 */
export function formatDateTime(date: Date): string {
  return date.toISOString().slice(0, 23).replace('T', ' ');
}
