/**
 * Portal Auth Types
 * Common types for authentication and authorization
 */

/** Intended consumer category of an access credential */
export type AudienceClass = 'admin' | 'app';

/** Sentinel role returned for superusers instead of graph-resolved roles */
export const SUPERUSER_ROLE = 'superuser';

/** Wildcard permission held by superusers */
export const WILDCARD_PERMISSION = '*';

export interface PortalUser {
  id: string;
  email: string | null;
  phone_number: string | null;
  display_name: string | null;
  password_hash: string | null;
  is_active: boolean;
  verified: boolean;
  is_admin: boolean;
  is_superuser: boolean;
  last_login_at: Date | null;
}

/** Identity snapshot embedded in an access credential */
export interface IdentitySnapshot {
  id: string;
  email: string;
  displayName: string;
  roles: string[];
  permissions: string[];
  familyId: string;
}

export interface RefreshCredentialRecord {
  id: string;
  user_id: string;
  device_id: string | null;
  family_id: string;
  /** Audience class the family was opened for */
  audience: AudienceClass;
  parent_id: string | null;
  replaced_by_id: string | null;
  token_hash: string;
  expires_at: Date;
  last_used_at: Date | null;
  revoked_at: Date | null;
  revoked_reason: string | null;
  ip: string | null;
  user_agent: string | null;
}

/** Client details recorded alongside refresh credentials and devices */
export interface ClientContext {
  ip: string | null;
  userAgent: string | null;
}

export interface TokenPair {
  access_token: string;
  refresh_token: string;
  token_type: 'Bearer';
  expires_in: number;
}
