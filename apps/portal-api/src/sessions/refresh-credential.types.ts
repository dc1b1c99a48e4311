import { AudienceClass, RefreshCredentialRecord } from '@portal/common/types';

export type InvalidRefreshReason =
  | 'not_found'
  | 'revoked'
  | 'reused'
  | 'expired'
  | 'concurrent_rotation'
  | 'audience_mismatch';

export interface InvalidRefreshCredential {
  kind: 'InvalidRefreshCredential';
  reason: InvalidRefreshReason;
}

export type RevocationReason =
  | 'logout'
  | 'reuse_detected'
  | 'concurrent_rotation'
  | 'password_change'
  | 'user_inactive';

export interface IssuedRefreshCredential {
  token: string;
  record: RefreshCredentialRecord;
}

export interface NewRefreshCredential {
  id: string;
  user_id: string;
  device_id: string | null;
  family_id: string;
  audience: AudienceClass;
  parent_id: string | null;
  token_hash: string;
  expires_at: Date;
  ip: string | null;
  user_agent: string | null;
}
