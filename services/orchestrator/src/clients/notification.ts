import { z } from 'zod';

import type { ServiceClient } from './serviceClient';

export interface NotificationRequest {
  userId: string;
  type: string;
  data: Record<string, unknown>;
}

export const notificationResultSchema = z.object({
  notificationId: z.string().min(1),
  status: z.string(),
  sentAt: z.string().optional()
});

export type NotificationResult = z.infer<typeof notificationResultSchema>;

export interface NotificationServiceClient {
  send(request: NotificationRequest, signal?: AbortSignal): Promise<NotificationResult>;
}

export class HttpNotificationServiceClient implements NotificationServiceClient {
  constructor(private readonly http: ServiceClient) {}

  send(request: NotificationRequest, signal?: AbortSignal) {
    return this.http.post('/api/notifications/send', { body: request, schema: notificationResultSchema, signal });
  }
}
