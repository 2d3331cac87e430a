/**
 * Role resolver: named personas prepended to prompts.
 *
 * User-defined roles are searched before built-ins; the first name match
 * wins.
 */

import type { ExampleSpeaker, RoleDetails } from "@parley/sdk";
import { ConfigError } from "@parley/sdk";
import { z } from "zod";
import { RoleDetailsSchema, validateInput } from "@parley/shared";
import builtinRoleData from "./builtin-roles.json" with { type: "json" };

const builtins = validateInput(z.array(RoleDetailsSchema), builtinRoleData);
if (!builtins.success) {
  throw new ConfigError(`Invalid built-in roles: ${builtins.error}`);
}

export const BUILTIN_ROLES: readonly RoleDetails[] = builtins.data;

export function resolveRole(
  name: string | undefined,
  userRoles: readonly RoleDetails[] = [],
  builtinRoles: readonly RoleDetails[] = BUILTIN_ROLES,
): RoleDetails | undefined {
  if (name === undefined) return undefined;
  return userRoles.find((r) => r.name === name) ?? builtinRoles.find((r) => r.name === name);
}

function speakerLabel(speaker: ExampleSpeaker): string {
  return speaker === "user" ? "USER" : "ASSISTANT";
}

/**
 * The role preamble: prompt (plus a newline when non-empty), then one
 * `SPEAKER: message` line per example.
 */
export function roleSystemPrompt(role: RoleDetails): string {
  let preamble = role.prompt ?? "";
  if (preamble.length > 0) {
    preamble += "\n";
  }
  for (const example of role.example ?? []) {
    preamble += `${speakerLabel(example.user)}: ${example.message}\n`;
  }
  return preamble;
}

export function prependRole(prompt: string, role: RoleDetails | undefined): string {
  if (!role) return prompt;
  return roleSystemPrompt(role) + prompt;
}

/** Human-readable description, one field per line. */
export function describeRole(role: RoleDetails): string {
  const lines = [`Role: ${role.name}`];
  if (role.description !== undefined) {
    lines.push(`Description: ${role.description}`);
  }
  if (role.prompt !== undefined) {
    lines.push(`Prompt: ${role.prompt}`);
  }
  if (role.example !== undefined) {
    lines.push("Example Messages:");
    for (const example of role.example) {
      lines.push(`  ${speakerLabel(example.user)}: ${example.message}`);
    }
  }
  return lines.join("\n");
}
