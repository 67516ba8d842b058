/**
 * Anything the router can check roles on. `username` is only used in logs.
 */
export interface RoleBearer {
  readonly roles: Iterable<string>;
  readonly username?: string;
}

/**
 * True when the user holds every required role. No required roles means public.
 */
export const hasPermission = (
  requiredRoles: Iterable<string>,
  userRoles: Iterable<string>
): boolean => {
  const held = new Set(userRoles);
  for (const role of requiredRoles) {
    if (!held.has(role)) {
      return false;
    }
  }
  return true;
};
