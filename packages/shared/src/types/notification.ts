import type { NOTIFICATION_SEVERITIES } from '../constants.js';

export type NotificationSeverity = (typeof NOTIFICATION_SEVERITIES)[number];

export interface Notification {
  owner_id: string;
  message: string;
  severity: NotificationSeverity;
}
