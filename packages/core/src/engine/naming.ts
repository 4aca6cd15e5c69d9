const MAX_NAME_LENGTH = 63;

/**
 * Sanitize a name for use as a GCE resource name: lowercase letters,
 * digits and hyphens, starting with a letter, at most 63 characters.
 */
export function sanitizeName(name: string, maxLength = MAX_NAME_LENGTH): string {
  const sanitized = name
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "-")
    .replace(/^[^a-z]/, "a")
    .replace(/-+/g, "-")
    .slice(0, maxLength)
    .replace(/-$/, "");

  if (!sanitized) {
    throw new Error(`Invalid name: "${name}" produces empty sanitized value`);
  }

  return sanitized;
}

/**
 * Instance name for a deployment. It depends only on the configured prefix
 * and the zone, so a lost state file can be rebuilt by looking the name up.
 */
export function instanceNameFor(prefix: string, zone: string): string {
  return sanitizeName(`${prefix}-${zone}`);
}
