import { z } from 'zod';

import type { ServiceClient } from './serviceClient';

export interface BasicKycRequest {
  userId: string;
  documents: Record<string, unknown>;
}

export interface EnhancedKycRequest extends BasicKycRequest {
  additionalVerification: Record<string, unknown>;
}

export const kycResultSchema = z.object({
  kycId: z.string().min(1),
  status: z.string(),
  processedAt: z.string().optional(),
  results: z.record(z.unknown()).default({})
});

export type KycResult = z.infer<typeof kycResultSchema>;

export interface IdentityVerificationClient {
  performBasicKyc(request: BasicKycRequest, signal?: AbortSignal): Promise<KycResult>;
  performEnhancedKyc(request: EnhancedKycRequest, signal?: AbortSignal): Promise<KycResult>;
}

export class HttpIdentityVerificationClient implements IdentityVerificationClient {
  constructor(private readonly http: ServiceClient) {}

  performBasicKyc(request: BasicKycRequest, signal?: AbortSignal) {
    return this.http.post('/api/kyc/basic', { body: request, schema: kycResultSchema, signal });
  }

  performEnhancedKyc(request: EnhancedKycRequest, signal?: AbortSignal) {
    return this.http.post('/api/kyc/enhanced', { body: request, schema: kycResultSchema, signal });
  }
}
