import { Queryable } from '@portal/common/database';
import { ClientContext, RefreshCredentialRecord } from '@portal/common/types';
import { RefreshCredentialRepository } from '../refresh-credential.repository';
import { NewRefreshCredential } from '../refresh-credential.types';

export interface DeviceRow {
  id: string;
  user_id: string;
  last_ip: string | null;
  last_user_agent: string | null;
}

/**
 * Table-backed stand-in for RefreshCredentialRepository.
 * Enforces the unique token_hash and partial unique parent_id indexes.
 */
export class InMemoryRefreshCredentialRepository
  implements RefreshCredentialRepository
{
  readonly rows = new Map<string, RefreshCredentialRecord>();
  readonly devices = new Map<string, DeviceRow>();

  async findByHash(
    _client: Queryable,
    tokenHash: string,
  ): Promise<RefreshCredentialRecord | null> {
    const row = [...this.rows.values()].find((r) => r.token_hash === tokenHash);
    return row ? { ...row } : null;
  }

  async findByHashForUpdate(
    client: Queryable,
    tokenHash: string,
  ): Promise<RefreshCredentialRecord | null> {
    return this.findByHash(client, tokenHash);
  }

  async insert(
    _client: Queryable,
    credential: NewRefreshCredential,
  ): Promise<RefreshCredentialRecord> {
    for (const row of this.rows.values()) {
      if (
        row.token_hash === credential.token_hash ||
        (credential.parent_id !== null && row.parent_id === credential.parent_id)
      ) {
        throw Object.assign(new Error('duplicate key value violates unique constraint'), {
          code: '23505',
        });
      }
    }

    const record: RefreshCredentialRecord = {
      ...credential,
      replaced_by_id: null,
      last_used_at: null,
      revoked_at: null,
      revoked_reason: null,
    };
    this.rows.set(record.id, record);
    return { ...record };
  }

  async supersede(
    _client: Queryable,
    id: string,
    successorId: string,
  ): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.replaced_by_id !== null || row.revoked_at !== null) {
      return false;
    }
    row.replaced_by_id = successorId;
    row.last_used_at = new Date();
    return true;
  }

  async revokeById(_client: Queryable, id: string, reason: string): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.revoked_at !== null) {
      return false;
    }
    row.revoked_at = new Date();
    row.revoked_reason = reason;
    return true;
  }

  async revokeFamily(
    _client: Queryable,
    familyId: string,
    reason: string,
  ): Promise<number> {
    return this.revokeWhere((row) => row.family_id === familyId, reason);
  }

  async revokeAllForUser(
    _client: Queryable,
    userId: string,
    reason: string,
  ): Promise<number> {
    return this.revokeWhere((row) => row.user_id === userId, reason);
  }

  async upsertDevice(
    _client: Queryable,
    deviceId: string,
    userId: string,
    context: ClientContext,
  ): Promise<void> {
    this.devices.set(deviceId, {
      id: deviceId,
      user_id: userId,
      last_ip: context.ip,
      last_user_agent: context.userAgent,
    });
  }

  family(familyId: string): RefreshCredentialRecord[] {
    return [...this.rows.values()].filter((row) => row.family_id === familyId);
  }

  private revokeWhere(
    predicate: (row: RefreshCredentialRecord) => boolean,
    reason: string,
  ): number {
    let count = 0;
    for (const row of this.rows.values()) {
      if (predicate(row) && row.revoked_at === null) {
        row.revoked_at = new Date();
        row.revoked_reason = reason;
        count++;
      }
    }
    return count;
  }
}
