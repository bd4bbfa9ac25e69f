import {
  ApiPermission,
  INTERNAL_ONLY,
  INTERNAL_TO_API_PERMISSION,
  InternalPermission,
  ROLE_PERMISSIONS,
  Role,
  checkPermissionMapping,
  expandRole,
  isGrantableOn,
  isRole,
  toApiPermissions,
} from '../../src/domain/rbac';

describe('role table', () => {
  test('built-in tables are complete', () => {
    expect(checkPermissionMapping()).toEqual([]);
  });

  test('every internal permission maps to an API permission or is internal-only', () => {
    for (const permission of Object.values(InternalPermission)) {
      const mapped = INTERNAL_TO_API_PERMISSION[permission];
      expect([...Object.values(ApiPermission), INTERNAL_ONLY]).toContain(mapped);
    }
  });

  test('reports an internal permission without mapping', () => {
    const mapping: Partial<Record<string, string>> = { ...INTERNAL_TO_API_PERMISSION };
    delete mapping[InternalPermission.ProgramManageAccess];

    expect(checkPermissionMapping(ROLE_PERMISSIONS, mapping)).toEqual([
      'internal permission "program_manage_access" has no API mapping',
    ]);
  });

  test('reports a mapping onto an unknown API permission', () => {
    const mapping = { ...INTERNAL_TO_API_PERMISSION, [InternalPermission.OrganizationReadReports]: 'export_everything' };

    expect(checkPermissionMapping(ROLE_PERMISSIONS, mapping)).toEqual([
      'internal permission "organization_read_reports" maps to unknown "export_everything"',
    ]);
  });

  test('reports a role expanding to an unknown permission', () => {
    const roles = { ...ROLE_PERMISSIONS, bogus: { organization: ['organization_fly'] } };

    expect(checkPermissionMapping(roles)).toEqual([
      'role "bogus" on organization expands to unknown permission "organization_fly"',
    ]);
  });
});

describe('expandRole', () => {
  test('program_manager expands per scope kind', () => {
    expect(expandRole(Role.ProgramManager, 'organization')).toEqual([
      InternalPermission.OrganizationReadMetadata,
      InternalPermission.OrganizationReadEnrollments,
      InternalPermission.OrganizationWriteEnrollments,
    ]);
    expect(expandRole(Role.ProgramManager, 'program')).toEqual([
      InternalPermission.ProgramReadMetadata,
      InternalPermission.ProgramReadEnrollments,
      InternalPermission.ProgramWriteEnrollments,
    ]);
  });

  test('a role not defined for the scope kind expands to nothing', () => {
    expect(expandRole(Role.OrganizationReadReports, 'program')).toEqual([]);
  });

  test('an unknown role is undefined', () => {
    expect(expandRole('superuser', 'organization')).toBeUndefined();
    expect(isRole('superuser')).toBe(false);
  });

  test('grantability follows the table', () => {
    expect(isGrantableOn(Role.ProgramReadReports, 'organization')).toBe(false);
    expect(isGrantableOn(Role.ProgramReadReports, 'program')).toBe(true);
    expect(isGrantableOn(Role.AccessManager, 'organization')).toBe(true);
  });
});

describe('toApiPermissions', () => {
  test('collapses internal permissions and drops internal-only ones', () => {
    const api = toApiPermissions([
      InternalPermission.OrganizationReadMetadata,
      InternalPermission.ProgramReadMetadata,
      InternalPermission.ProgramManageAccess,
      InternalPermission.OrganizationReadReports,
    ]);

    expect([...api].sort()).toEqual([ApiPermission.ReadMetadata, ApiPermission.ReadReports]);
  });
});
