export const ROLES = ["owner", "admin", "member"] as const;
export type Role = (typeof ROLES)[number];

export const ACTIONS = ["view", "edit", "delete", "manage_members", "change_owner"] as const;
export type Action = (typeof ACTIONS)[number];

export const ROLE_PERMISSIONS: Readonly<Record<Role, ReadonlySet<Action>>> = Object.freeze({
  owner: new Set<Action>(["view", "edit", "delete", "manage_members", "change_owner"]),
  admin: new Set<Action>(["view", "edit", "manage_members"]),
  member: new Set<Action>(["view"]),
});

const ROLE_RANK: Readonly<Record<Role, number>> = Object.freeze({
  owner: 3,
  admin: 2,
  member: 1,
});

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

export function roleAllows(role: Role, action: Action): boolean {
  return ROLE_PERMISSIONS[role].has(action);
}

export function permissionsFor(role: Role): Action[] {
  return ACTIONS.filter((action) => roleAllows(role, action));
}

export function rolesGranting(action: Action): Role[] {
  return ROLES.filter((role) => roleAllows(role, action));
}

export function highestRole(roles: Iterable<Role>): Role | null {
  let best: Role | null = null;
  for (const role of roles) {
    if (best === null || ROLE_RANK[role] > ROLE_RANK[best]) {
      best = role;
    }
  }
  return best;
}
