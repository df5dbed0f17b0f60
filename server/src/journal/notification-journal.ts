/**
 * Notification Journal
 *
 * Append-only JSONL audit log of what the daemon received and how each
 * notification ended. Never read back. A failed write is logged and the
 * daemon carries on.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { createLogger, getErrorMessage } from '@xnotid/core';
import type { CloseReason, EngineEvent, Logger, NotificationEngine, Urgency } from '@xnotid/core';

export type JournalEventKind = 'received' | 'replaced' | CloseReason | 'action';

export interface JournalEntry {
  ts: string;
  event: JournalEventKind;
  id: number;
  app: string;
  summary: string;
  /** Only on received/replaced */
  body?: string;
  urgency?: Urgency;
  /** Only on action */
  action?: string;
}

export interface NotificationJournalOptions {
  path: string;
  logger?: Logger;
  now?: () => Date;
}

/** The journal line for an engine event, or null for events not journaled. */
export function toJournalEntry(event: EngineEvent, now: Date): JournalEntry | null {
  const ts = now.toISOString();
  switch (event.type) {
    case 'notification_received': {
      const { notification } = event;
      return {
        ts,
        event: event.replaced ? 'replaced' : 'received',
        id: notification.id,
        app: notification.appName,
        summary: notification.summary,
        body: notification.body,
        urgency: notification.details.urgency,
      };
    }
    case 'notification_closed':
      return {
        ts,
        event: event.reason,
        id: event.id,
        app: event.notification.appName,
        summary: event.notification.summary,
      };
    case 'action_invoked':
      return {
        ts,
        event: 'action',
        id: event.id,
        app: event.notification.appName,
        summary: event.notification.summary,
        action: event.actionKey,
      };
    default:
      return null;
  }
}

export class NotificationJournal {
  readonly path: string;
  private logger: Logger;
  private now: () => Date;
  private directoryReady = false;

  constructor(options: NotificationJournalOptions) {
    this.path = options.path;
    this.logger = options.logger ?? createLogger({ silent: true });
    this.now = options.now ?? (() => new Date());
  }

  /** Journal every engine event from now on. Returns a detach function. */
  attach(engine: NotificationEngine): () => void {
    return engine.subscribe((event) => this.record(event));
  }

  record(event: EngineEvent): void {
    const entry = toJournalEntry(event, this.now());
    if (entry) this.append(entry);
  }

  private append(entry: JournalEntry): void {
    try {
      if (!this.directoryReady) {
        mkdirSync(dirname(this.path), { recursive: true });
        this.directoryReady = true;
      }
      appendFileSync(this.path, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      this.logger.warn(`[Journal] Could not write ${this.path}: ${getErrorMessage(err)}`);
    }
  }
}
