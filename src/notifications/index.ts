/**
 * User notifications - in-app messages raised by the sync pipeline
 * ("Item sold", "Reconnect required", subscription failures, ...)
 */

import { createLogger } from '../utils/logger';
import { generateId } from '../utils/id';
import type { Database, Row } from '../db/index';
import { oneOf, optNum, str, num } from '../db/rows';
import type { NotificationType, UserNotification } from '../types';

const logger = createLogger('notifications');

const NOTIFICATION_TYPES: readonly NotificationType[] = ['info', 'success', 'warning', 'error'];

export interface NotifyInput {
  type: NotificationType;
  title: string;
  message: string;
  source: string;
}

export interface ListNotificationsOptions {
  unreadOnly?: boolean;
  limit?: number;
}

export interface NotificationService {
  notify(userId: string, input: NotifyInput, now?: number): UserNotification;
  list(userId: string, options?: ListNotificationsOptions): UserNotification[];
  markRead(userId: string, id: string, now?: number): boolean;
}

function parseNotificationRow(row: Row): UserNotification {
  return {
    id: str(row, 'id'),
    userId: str(row, 'user_id'),
    type: oneOf(row, 'type', NOTIFICATION_TYPES),
    title: str(row, 'title'),
    message: str(row, 'message'),
    source: str(row, 'source'),
    readAt: optNum(row, 'read_at'),
    createdAt: num(row, 'created_at'),
  };
}

export function createNotificationService(db: Database): NotificationService {
  return {
    notify(userId, input, now = Date.now()) {
      const notification: UserNotification = {
        id: generateId('ntf'),
        userId,
        type: input.type,
        title: input.title,
        message: input.message,
        source: input.source,
        readAt: null,
        createdAt: now,
      };
      db.run(
        `INSERT INTO notifications (id, user_id, type, title, message, source, read_at, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [notification.id, userId, input.type, input.title, input.message, input.source, null, now],
      );
      logger.info({ userId, type: input.type, title: input.title, source: input.source }, 'Notification created');
      return notification;
    },

    list(userId, options = {}) {
      const limit = Math.min(Math.max(1, options.limit ?? 50), 500);
      const sql = options.unreadOnly
        ? 'SELECT * FROM notifications WHERE user_id = ? AND read_at IS NULL ORDER BY created_at DESC, id DESC LIMIT ?'
        : 'SELECT * FROM notifications WHERE user_id = ? ORDER BY created_at DESC, id DESC LIMIT ?';
      return db.query(sql, [userId, limit]).map(parseNotificationRow);
    },

    markRead(userId, id, now = Date.now()) {
      return db.run('UPDATE notifications SET read_at = ? WHERE id = ? AND user_id = ? AND read_at IS NULL', [now, id, userId]) > 0;
    },
  };
}
