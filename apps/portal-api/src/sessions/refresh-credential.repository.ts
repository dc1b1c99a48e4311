/**
 * Refresh credential persistence
 * Every method runs on the caller's client so rotation stays in one transaction.
 */

import { Injectable } from '@nestjs/common';
import { Queryable } from '@portal/common/database';
import { ClientContext, RefreshCredentialRecord } from '@portal/common/types';
import { NewRefreshCredential } from './refresh-credential.types';

const COLUMNS = `id, user_id, device_id, family_id, audience, parent_id, replaced_by_id,
  token_hash, expires_at, last_used_at, revoked_at, revoked_reason, ip, user_agent`;

@Injectable()
export class RefreshCredentialRepository {
  async findByHash(
    client: Queryable,
    tokenHash: string,
  ): Promise<RefreshCredentialRecord | null> {
    const result = await client.query<RefreshCredentialRecord>(
      `SELECT ${COLUMNS} FROM refresh_credential WHERE token_hash = $1`,
      [tokenHash],
    );
    return result.rows[0] ?? null;
  }

  /**
   * Lock the row until the surrounding transaction ends
   */
  async findByHashForUpdate(
    client: Queryable,
    tokenHash: string,
  ): Promise<RefreshCredentialRecord | null> {
    const result = await client.query<RefreshCredentialRecord>(
      `SELECT ${COLUMNS} FROM refresh_credential WHERE token_hash = $1 FOR UPDATE`,
      [tokenHash],
    );
    return result.rows[0] ?? null;
  }

  async insert(
    client: Queryable,
    credential: NewRefreshCredential,
  ): Promise<RefreshCredentialRecord> {
    const result = await client.query<RefreshCredentialRecord>(
      `INSERT INTO refresh_credential
         (id, user_id, device_id, family_id, audience, parent_id, token_hash, expires_at, ip, user_agent, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, now())
       RETURNING ${COLUMNS}`,
      [
        credential.id,
        credential.user_id,
        credential.device_id,
        credential.family_id,
        credential.audience,
        credential.parent_id,
        credential.token_hash,
        credential.expires_at,
        credential.ip,
        credential.user_agent,
      ],
    );
    return result.rows[0];
  }

  /**
   * Link a record to its successor. Returns false when another rotation
   * already superseded or revoked it.
   */
  async supersede(
    client: Queryable,
    id: string,
    successorId: string,
  ): Promise<boolean> {
    const result = await client.query(
      `UPDATE refresh_credential
       SET replaced_by_id = $2, last_used_at = now()
       WHERE id = $1 AND replaced_by_id IS NULL AND revoked_at IS NULL`,
      [id, successorId],
    );
    return result.rowCount === 1;
  }

  async revokeById(client: Queryable, id: string, reason: string): Promise<boolean> {
    const result = await client.query(
      `UPDATE refresh_credential
       SET revoked_at = now(), revoked_reason = $2
       WHERE id = $1 AND revoked_at IS NULL`,
      [id, reason],
    );
    return result.rowCount === 1;
  }

  async revokeFamily(
    client: Queryable,
    familyId: string,
    reason: string,
  ): Promise<number> {
    const result = await client.query(
      `UPDATE refresh_credential
       SET revoked_at = now(), revoked_reason = $2
       WHERE family_id = $1 AND revoked_at IS NULL`,
      [familyId, reason],
    );
    return result.rowCount ?? 0;
  }

  async revokeAllForUser(
    client: Queryable,
    userId: string,
    reason: string,
  ): Promise<number> {
    const result = await client.query(
      `UPDATE refresh_credential
       SET revoked_at = now(), revoked_reason = $2
       WHERE user_id = $1 AND revoked_at IS NULL`,
      [userId, reason],
    );
    return result.rowCount ?? 0;
  }

  async upsertDevice(
    client: Queryable,
    deviceId: string,
    userId: string,
    context: ClientContext,
  ): Promise<void> {
    await client.query(
      `INSERT INTO auth_device (id, user_id, first_seen_at, last_seen_at, last_ip, last_user_agent)
       VALUES ($1, $2, now(), now(), $3, $4)
       ON CONFLICT (id) DO UPDATE
       SET user_id = EXCLUDED.user_id,
           last_seen_at = now(),
           last_ip = EXCLUDED.last_ip,
           last_user_agent = EXCLUDED.last_user_agent`,
      [deviceId, userId, context.ip, context.userAgent],
    );
  }
}
