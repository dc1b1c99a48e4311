/**
 * Filters raw User→Role→Permission join rows into role and permission codes
 */

export interface GrantRow {
  role_code: string;
  role_active: boolean;
  role_deleted: boolean;
  permission_code: string | null;
  permission_active: boolean | null;
  permission_deleted: boolean | null;
  resource_active: boolean | null;
  resource_visible: boolean | null;
  resource_deleted: boolean | null;
  verb_active: boolean | null;
  verb_deleted: boolean | null;
  expire_date: Date | null;
}

function sortedUnique(codes: Iterable<string>): string[] {
  return [...new Set(codes)].sort();
}

function roleUsable(row: GrantRow): boolean {
  return row.role_active && !row.role_deleted;
}

function grantUsable(row: GrantRow, now: Date): boolean {
  return (
    roleUsable(row) &&
    row.permission_code !== null &&
    row.permission_active === true &&
    row.permission_deleted === false &&
    row.resource_active === true &&
    row.resource_visible === true &&
    row.resource_deleted === false &&
    row.verb_active === true &&
    row.verb_deleted === false &&
    (row.expire_date === null || row.expire_date.getTime() > now.getTime())
  );
}

export function evaluateRoles(rows: readonly GrantRow[]): string[] {
  return sortedUnique(rows.filter(roleUsable).map((row) => row.role_code));
}

export function evaluatePermissions(rows: readonly GrantRow[], now: Date): string[] {
  const codes: string[] = [];
  for (const row of rows) {
    if (grantUsable(row, now) && row.permission_code !== null) {
      codes.push(row.permission_code);
    }
  }
  return sortedUnique(codes);
}
