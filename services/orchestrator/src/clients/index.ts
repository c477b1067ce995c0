import type { CollaboratorConfig, CollaboratorName } from '../config';
import { HttpIdentityVerificationClient, type IdentityVerificationClient } from './identity';
import { HttpLedgerServiceClient, type LedgerServiceClient } from './ledger';
import { HttpMarketplaceServiceClient, type MarketplaceServiceClient } from './marketplace';
import { HttpMultisigServiceClient, type MultisigServiceClient } from './multisig';
import { HttpNotificationServiceClient, type NotificationServiceClient } from './notification';
import { HttpPaymentServiceClient, type PaymentServiceClient } from './payment';
import { ServiceClient, type CallOutcome, type FetchLike } from './serviceClient';
import { HttpSignatureServiceClient, type SignatureServiceClient } from './signature';
import { HttpTreasuryServiceClient, type TreasuryServiceClient } from './treasury';
import { HttpUserServiceClient, type UserServiceClient } from './user';

export interface Collaborators {
  signature: SignatureServiceClient;
  multisig: MultisigServiceClient;
  payment: PaymentServiceClient;
  ledger: LedgerServiceClient;
  user: UserServiceClient;
  marketplace: MarketplaceServiceClient;
  treasury: TreasuryServiceClient;
  notification: NotificationServiceClient;
  identity: IdentityVerificationClient;
}

export type HealthProbe = (signal?: AbortSignal) => Promise<boolean>;

export interface CollaboratorSet {
  clients: Collaborators;
  health: Record<CollaboratorName, HealthProbe>;
}

export interface CreateCollaboratorsOptions {
  fetchImpl?: FetchLike;
  onCall?: (service: string, outcome: CallOutcome) => void;
}

export const createCollaborators = (
  config: Record<CollaboratorName, CollaboratorConfig>,
  options: CreateCollaboratorsOptions = {}
): CollaboratorSet => {
  const http = (name: CollaboratorName) =>
    new ServiceClient({
      service: name,
      baseUrl: config[name].baseUrl,
      timeoutMs: config[name].timeoutMs,
      retries: config[name].retries,
      fetchImpl: options.fetchImpl,
      onCall: options.onCall
    });

  const transports: Record<CollaboratorName, ServiceClient> = {
    signature: http('signature'),
    multisig: http('multisig'),
    payment: http('payment'),
    ledger: http('ledger'),
    user: http('user'),
    marketplace: http('marketplace'),
    treasury: http('treasury'),
    notification: http('notification'),
    identity: http('identity')
  };

  const probe = (name: CollaboratorName): HealthProbe => (signal) => transports[name].checkHealth(signal);

  return {
    clients: {
      signature: new HttpSignatureServiceClient(transports.signature),
      multisig: new HttpMultisigServiceClient(transports.multisig),
      payment: new HttpPaymentServiceClient(transports.payment),
      ledger: new HttpLedgerServiceClient(transports.ledger),
      user: new HttpUserServiceClient(transports.user),
      marketplace: new HttpMarketplaceServiceClient(transports.marketplace),
      treasury: new HttpTreasuryServiceClient(transports.treasury),
      notification: new HttpNotificationServiceClient(transports.notification),
      identity: new HttpIdentityVerificationClient(transports.identity)
    },
    health: {
      signature: probe('signature'),
      multisig: probe('multisig'),
      payment: probe('payment'),
      ledger: probe('ledger'),
      user: probe('user'),
      marketplace: probe('marketplace'),
      treasury: probe('treasury'),
      notification: probe('notification'),
      identity: probe('identity')
    }
  };
};

export { ServiceClient, ServiceClientError } from './serviceClient';
export type { CallOutcome, FetchLike } from './serviceClient';
