import { z } from 'zod';

import type { ServiceClient } from './serviceClient';

export const userProfileSchema = z
  .object({
    id: z.string(),
    email: z.string().default(''),
    displayName: z.string().nullable().optional(),
    country: z.string().nullable().optional(),
    isActive: z.boolean().default(true),
    isVerified: z.boolean().default(false)
  })
  .passthrough();

export type UserProfile = z.infer<typeof userProfileSchema>;

export interface UserServiceClient {
  getUser(userId: string, signal?: AbortSignal): Promise<UserProfile>;
}

export class HttpUserServiceClient implements UserServiceClient {
  constructor(private readonly http: ServiceClient) {}

  getUser(userId: string, signal?: AbortSignal) {
    return this.http.get(`/api/users/${encodeURIComponent(userId)}`, {
      schema: userProfileSchema,
      signal
    });
  }
}
