import { WILDCARD_PERMISSION } from '@portal/common/types';

/**
 * `*` matches everything, `resource:*` matches every verb of that resource,
 * anything else must match exactly.
 */
export function permissionMatches(held: readonly string[], required: string): boolean {
  for (const code of held) {
    if (code === WILDCARD_PERMISSION || code === required) {
      return true;
    }
    if (code.endsWith(':*')) {
      const resource = code.slice(0, -1);
      if (required.startsWith(resource)) {
        return true;
      }
    }
  }
  return false;
}

export function missingPermissions(
  held: readonly string[],
  required: readonly string[],
): string[] {
  return required.filter((code) => !permissionMatches(held, code));
}
