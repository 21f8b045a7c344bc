/**
 * Shared-key gate of the dashboard. An empty password disables the check.
 */
export function isAuthorized(password: string, key: string | undefined): boolean {
  if (!password) {
    return true;
  }
  return key === password;
}
