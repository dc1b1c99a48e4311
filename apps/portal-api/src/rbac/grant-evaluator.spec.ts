import { GrantRow, evaluatePermissions, evaluateRoles } from './grant-evaluator';

const NOW = new Date('2026-03-01T00:00:00Z');

function grant(overrides: Partial<GrantRow> = {}): GrantRow {
  return {
    role_code: 'speaker',
    role_active: true,
    role_deleted: false,
    permission_code: 'conference:conferences:read',
    permission_active: true,
    permission_deleted: false,
    resource_active: true,
    resource_visible: true,
    resource_deleted: false,
    verb_active: true,
    verb_deleted: false,
    expire_date: null,
    ...overrides,
  };
}

describe('evaluatePermissions', () => {
  it('should exclude a grant whose expire_date has passed', () => {
    const rows = [grant({ expire_date: new Date('2026-02-28T23:59:59Z') })];

    expect(evaluatePermissions(rows, NOW)).toEqual([]);
  });

  it('should treat a grant expiring exactly now as expired', () => {
    expect(evaluatePermissions([grant({ expire_date: NOW })], NOW)).toEqual([]);
  });

  it('should keep future-dated and open-ended grants', () => {
    const rows = [
      grant({ permission_code: 'workshop:workshops:read', expire_date: new Date('2026-04-01') }),
      grant({ permission_code: 'support:faq:read' }),
    ];

    expect(evaluatePermissions(rows, NOW)).toEqual([
      'support:faq:read',
      'workshop:workshops:read',
    ]);
  });

  it('should drop inactive, deleted and invisible parts of the graph', () => {
    const rows = [
      grant({ permission_code: 'a:b:read', role_active: false }),
      grant({ permission_code: 'a:b:create', permission_deleted: true }),
      grant({ permission_code: 'a:b:modify', resource_visible: false }),
      grant({ permission_code: 'a:b:delete', verb_active: false }),
      grant({ permission_code: 'c:d:read', resource_deleted: true }),
    ];

    expect(evaluatePermissions(rows, NOW)).toEqual([]);
  });

  it('should deduplicate codes granted through several roles', () => {
    const rows = [
      grant({ role_code: 'speaker' }),
      grant({ role_code: 'staff' }),
    ];

    expect(evaluatePermissions(rows, NOW)).toEqual(['conference:conferences:read']);
  });
});

describe('evaluateRoles', () => {
  it('should list active roles once, sorted, including roles without grants', () => {
    const rows = [
      grant({ role_code: 'staff' }),
      grant({ role_code: 'staff', permission_code: 'support:faq:read' }),
      grant({
        role_code: 'attendee',
        permission_code: null,
        permission_active: null,
        permission_deleted: null,
        resource_active: null,
        resource_visible: null,
        resource_deleted: null,
        verb_active: null,
        verb_deleted: null,
      }),
      grant({ role_code: 'retired', role_deleted: true }),
    ];

    expect(evaluateRoles(rows)).toEqual(['attendee', 'staff']);
  });
});
