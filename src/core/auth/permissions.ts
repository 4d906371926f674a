export const PERMISSIONS = [
  'read',
  'write',
  'delete',
  'manage_users',
  'comment',
  'favorite',
  'like',
  'cart',
  'admin',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

export const USER_GROUPS = ['user', 'moderator', 'admin'] as const;

export type UserGroup = (typeof USER_GROUPS)[number];

const GROUP_PERMISSIONS: Record<UserGroup, ReadonlySet<Permission>> = {
  user: new Set<Permission>(['read', 'comment', 'favorite', 'like', 'cart']),
  moderator: new Set<Permission>([
    'read',
    'write',
    'comment',
    'favorite',
    'like',
    'cart',
  ]),
  admin: new Set<Permission>(PERMISSIONS),
};

export function isUserGroup(value: string): value is UserGroup {
  return USER_GROUPS.some((group) => group === value);
}

export function hasPermission(group: UserGroup, action: Permission): boolean {
  return GROUP_PERMISSIONS[group].has(action);
}
