export type NotificationSeverity = 'info' | 'warning' | 'error';

export interface NotificationSink {
  notify(title: string, message: string, severity: NotificationSeverity): void;
}
