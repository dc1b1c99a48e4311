/**
 * Portal access credential types
 */

export interface AccessClaims {
  iss: string;
  sub: string; // "<user id>:<audience class>"
  aud: string; // "<app name>-<audience class>"
  iat: number;
  exp: number;
  uid: string;
  email: string;
  name: string;
  roles: string[];
  permissions: string[];
  fid: string; // refresh family id
}

export type InvalidCredentialReason =
  | 'expired'
  | 'malformed'
  | 'signature'
  | 'claims';

export interface InvalidCredential {
  kind: 'InvalidCredential';
  reason: InvalidCredentialReason;
}
