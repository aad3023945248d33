/**
 * Watermarks - per (user, stream) cursors for polling and backfill.
 *
 * Callers read the cursor, pass it explicitly into the poll/backfill call,
 * and write back whatever that call reports.
 */

import type { Database } from '../db/index';
import { num } from '../db/rows';

export type WatermarkStream = 'orders_poll' | 'listings_poll' | 'orders_backfill';

export interface Watermark {
  userId: string;
  stream: WatermarkStream;
  cursorAt: number;
  updatedAt: number;
}

export function getWatermark(db: Database, userId: string, stream: WatermarkStream): Watermark | null {
  const row = db.get('SELECT cursor_at, updated_at FROM watermarks WHERE user_id = ? AND stream = ?', [userId, stream]);
  if (!row) return null;
  return { userId, stream, cursorAt: num(row, 'cursor_at'), updatedAt: num(row, 'updated_at') };
}

/** Overwrite the cursor. */
export function setWatermark(db: Database, userId: string, stream: WatermarkStream, cursorAt: number, now: number): void {
  db.run(
    `INSERT INTO watermarks (user_id, stream, cursor_at, updated_at) VALUES (?, ?, ?, ?)
     ON CONFLICT(user_id, stream) DO UPDATE SET cursor_at = excluded.cursor_at, updated_at = excluded.updated_at`,
    [userId, stream, cursorAt, now],
  );
}

/** Move the cursor forward only; returns the cursor now stored. */
export function advanceWatermark(db: Database, userId: string, stream: WatermarkStream, cursorAt: number, now: number): number {
  const current = getWatermark(db, userId, stream);
  if (current && current.cursorAt >= cursorAt) return current.cursorAt;
  setWatermark(db, userId, stream, cursorAt, now);
  return cursorAt;
}
