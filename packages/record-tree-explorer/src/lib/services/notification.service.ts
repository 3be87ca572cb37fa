import { BehaviorSubject, type Observable } from 'rxjs';

import type { NotificationSeverity, NotificationSink } from '@record-tree/core';

import type { Logger } from '../logging/logger';

export interface TreeNotification {
  id: number;
  title: string;
  message: string;
  severity: NotificationSeverity;
  at: Date;
}

export interface NotificationServiceOptions {
  logger: Logger;
  /** Number of notifications kept for display. */
  historySize?: number;
  now?: () => Date;
}

export const DEFAULT_NOTIFICATION_HISTORY = 5;

/** Keeps the most recent toasts for the screen and mirrors each one to the log. */
export class NotificationService implements NotificationSink {
  private readonly logger: Logger;
  private readonly historySize: number;
  private readonly now: () => Date;
  private readonly history = new BehaviorSubject<readonly TreeNotification[]>([]);
  private nextId = 1;

  public readonly notifications$: Observable<readonly TreeNotification[]> =
    this.history.asObservable();

  constructor(options: NotificationServiceOptions) {
    this.logger = options.logger.child({ component: 'notifications' });
    this.historySize = Math.max(1, options.historySize ?? DEFAULT_NOTIFICATION_HISTORY);
    this.now = options.now ?? (() => new Date());
  }

  public get notifications(): readonly TreeNotification[] {
    return this.history.value;
  }

  public notify(title: string, message: string, severity: NotificationSeverity): void {
    const notification: TreeNotification = {
      id: this.nextId++,
      title,
      message,
      severity,
      at: this.now(),
    };

    switch (severity) {
      case 'error':
        this.logger.error({ title }, message);
        break;
      case 'warning':
        this.logger.warn({ title }, message);
        break;
      default:
        this.logger.info({ title }, message);
    }

    this.history.next([...this.history.value, notification].slice(-this.historySize));
  }

  public clear(): void {
    this.history.next([]);
  }

  public dispose(): void {
    this.history.complete();
  }
}
