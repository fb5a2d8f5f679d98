/**
 * Role registry — roles selectable by key from config or the command line.
 */
import { ConfigError } from "../infra/errors.ts";
import type { Tool } from "../tools/types.ts";
import { researcher } from "./researcher.ts";
import type { Role } from "./types.ts";

export type { Role } from "./types.ts";

export const ROLES: Readonly<Record<string, Role>> = {
  researcher,
};

/** Resolve role keys (case-insensitive); unknown keys are a configuration error. */
export function resolveRoles(keys: readonly string[]): Role[] {
  return keys.map((key) => {
    const role = ROLES[key.toLowerCase()];
    if (!role) {
      throw new ConfigError(
        `Unknown role "${key}". Available roles: ${Object.keys(ROLES).join(", ")}`,
      );
    }
    return role;
  });
}

/** Union of the roles' tools, first occurrence wins on a shared name. */
export function collectRoleTools(roles: readonly Role[]): Tool[] {
  const seen = new Map<string, Tool>();
  for (const role of roles) {
    for (const tool of role.tools) {
      if (!seen.has(tool.name)) seen.set(tool.name, tool);
    }
  }
  return [...seen.values()];
}
