/**
 * Roles command - describe the built-in and configured roles.
 */

import type { RoleDetails } from "@parley/sdk";
import { BUILTIN_ROLES, describeRole, resolveRole } from "@parley/core";
import type { CliCommand, ParsedArgs } from "./base.js";
import { stringFlag } from "./base.js";
import { loadConfigFile } from "../utils/config-loader.js";
import { validateConfig } from "../utils/config-validator.js";

export class RolesCommand implements CliCommand {
  name = "roles";
  description = "Describe a role, or all roles when none is named";

  async execute(args: ParsedArgs): Promise<number> {
    let userRoles: RoleDetails[] = [];
    const configPath = stringFlag(args, "config");
    if (configPath !== undefined) {
      try {
        const validation = validateConfig(await loadConfigFile(configPath));
        if (!validation.valid || !validation.config) {
          console.error(`[cli] Invalid config ${configPath}`);
          return 1;
        }
        userRoles = validation.config.roles ?? [];
      } catch (err) {
        console.error(`[cli] ${err instanceof Error ? err.message : String(err)}`);
        return 1;
      }
    }

    const name = stringFlag(args, "role") ?? args.positional[0];
    if (name !== undefined) {
      const role = resolveRole(name, userRoles);
      if (!role) {
        console.error(`Unknown role: ${name}`);
        return 1;
      }
      console.log(describeRole(role));
      return 0;
    }

    // A configured role hides the built-in of the same name
    const shadowed = new Set(userRoles.map((role) => role.name));
    const roles = [...userRoles, ...BUILTIN_ROLES.filter((role) => !shadowed.has(role.name))];
    console.log(roles.map((role) => describeRole(role)).join("\n\n"));
    return 0;
  }
}
