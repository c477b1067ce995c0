import { z } from 'zod';

import type { ServiceClient } from './serviceClient';

// The multisig endpoints exchange loosely shaped artifact bags.
export const artifactBagSchema = z.record(z.unknown());

export type ArtifactBag = z.infer<typeof artifactBagSchema>;

export interface MultisigServiceClient {
  generate(request: Record<string, unknown>, signal?: AbortSignal): Promise<ArtifactBag>;
  persist(artifacts: ArtifactBag, signal?: AbortSignal): Promise<ArtifactBag>;
  publishSets(artifacts: ArtifactBag, signal?: AbortSignal): Promise<ArtifactBag>;
  ingest(payload: ArtifactBag, signal?: AbortSignal): Promise<ArtifactBag>;
}

export class HttpMultisigServiceClient implements MultisigServiceClient {
  constructor(private readonly http: ServiceClient) {}

  generate(request: Record<string, unknown>, signal?: AbortSignal) {
    return this.http.post('/internal/multisig/generate', { body: request, schema: artifactBagSchema, signal });
  }

  persist(artifacts: ArtifactBag, signal?: AbortSignal) {
    return this.http.post('/internal/multisig/persist', { body: artifacts, schema: artifactBagSchema, signal });
  }

  publishSets(artifacts: ArtifactBag, signal?: AbortSignal) {
    return this.http.post('/internal/multisig/publish-sets', { body: artifacts, schema: artifactBagSchema, signal });
  }

  ingest(payload: ArtifactBag, signal?: AbortSignal) {
    return this.http.post('/internal/multisig/ingest', { body: payload, schema: artifactBagSchema, signal });
  }
}
