/**
 * Immutable method + path pattern table of route auth requirements
 */

import { AudienceClass } from '@portal/common/types';
import { PermissionMode, RouteAuthOptions } from './route-auth.decorator';

export interface RouteRequirement {
  readonly required: boolean;
  readonly audience: AudienceClass;
  readonly permissions: readonly string[];
  readonly mode: PermissionMode;
  readonly allowSuperuser: boolean;
}

export interface RouteEntry {
  method: string;
  path: string;
  requirement: RouteRequirement;
}

interface CompiledEntry {
  readonly method: string;
  readonly pattern: string;
  readonly segments: readonly string[];
  readonly paramCount: number;
  readonly requirement: RouteRequirement;
}

export function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

function isParam(segment: string): boolean {
  return segment.startsWith(':');
}

// Express routes case-insensitively and answers HEAD with the GET handler
function normalizeMethod(method: string): string {
  const upper = method.toUpperCase();
  return upper === 'HEAD' ? 'GET' : upper;
}

export function toRequirement(options: RouteAuthOptions): RouteRequirement {
  return Object.freeze({
    required: options.required ?? true,
    audience: options.audience,
    permissions: Object.freeze([...(options.permissions ?? [])]),
    mode: options.mode ?? 'all',
    allowSuperuser: options.allowSuperuser ?? true,
  });
}

export class RouteTable {
  private readonly entries: readonly CompiledEntry[];

  private constructor(entries: CompiledEntry[]) {
    // Static segments win over parameters when two patterns overlap
    this.entries = Object.freeze(
      [...entries].sort((a, b) => a.paramCount - b.paramCount),
    );
  }

  static build(routes: readonly RouteEntry[]): RouteTable {
    return new RouteTable(
      routes.map((route) => {
        const segments = splitPath(route.path).map((segment) =>
          isParam(segment) ? segment : segment.toLowerCase(),
        );
        return Object.freeze({
          method: normalizeMethod(route.method),
          pattern: `/${segments.join('/')}`,
          segments: Object.freeze(segments),
          paramCount: segments.filter(isParam).length,
          requirement: route.requirement,
        });
      }),
    );
  }

  get size(): number {
    return this.entries.length;
  }

  patterns(): string[] {
    return this.entries.map((entry) => `${entry.method} ${entry.pattern}`);
  }

  lookup(method: string, path: string): RouteRequirement | null {
    const normalized = normalizeMethod(method);
    const segments = splitPath(path).map((segment) => segment.toLowerCase());

    for (const entry of this.entries) {
      if (
        (entry.method === normalized || entry.method === 'ALL') &&
        this.matches(entry.segments, segments)
      ) {
        return entry.requirement;
      }
    }
    return null;
  }

  private matches(pattern: readonly string[], segments: string[]): boolean {
    if (pattern.length !== segments.length) {
      return false;
    }
    return pattern.every(
      (part, i) => part === segments[i] || isParam(part),
    );
  }
}
