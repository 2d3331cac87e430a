/**
 * Config validation with detailed error reporting.
 *
 * Zod schema first, then the semantic rules the schema cannot express.
 */

import type { BotConfig } from "@parley/sdk";
import { BotConfigSchema } from "@parley/shared";
import { backendDisplayName, resolveRole } from "@parley/core";
import type { ZodError } from "zod";

export interface ConfigValidationError {
  /** Dotted path into the config, e.g. "backends.1.name" */
  path: string;
  message: string;
  severity: "error" | "warning";
  suggestion?: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  /** Validated config (only if valid) */
  config?: BotConfig;
  /** Errors, or warnings on a valid config */
  errors?: ConfigValidationError[];
}

export function validateConfig(config: unknown): ConfigValidationResult {
  const result = BotConfigSchema.safeParse(config);
  if (!result.success) {
    return { valid: false, errors: parseZodErrors(result.error) };
  }

  const allErrors = validateSemantics(result.data);
  if (allErrors.some((e) => e.severity === "error")) {
    return { valid: false, errors: allErrors };
  }

  return {
    valid: true,
    config: result.data,
    errors: allErrors.length > 0 ? allErrors : undefined,
  };
}

function validateSemantics(config: BotConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (config.allow_list === undefined) {
    errors.push({
      path: "allow_list",
      message: "No allow_list configured. The bot will not answer anyone",
      severity: "warning",
      suggestion: 'Add a sender pattern such as "@.*:example\\.org"',
    });
  } else {
    try {
      new RegExp(config.allow_list);
    } catch (err) {
      errors.push({
        path: "allow_list",
        message: `Invalid regular expression: ${err instanceof Error ? err.message : String(err)}`,
        severity: "error",
      });
    }
  }

  const seen = new Set<string>();
  (config.backends ?? []).forEach((backend, index) => {
    const name = backendDisplayName(backend);
    if (seen.has(name)) {
      errors.push({
        path: `backends.${index}.name`,
        message: `Duplicate backend name "${name}"`,
        severity: "error",
        suggestion: "Give each backend of the same type a distinct name",
      });
    }
    seen.add(name);

    if (backend.type === "openaicompatible") {
      if (backend.api_base === undefined) {
        errors.push({
          path: `backends.${index}.api_base`,
          message: `Backend "${name}" has no api_base; requests to it will fail`,
          severity: "warning",
        });
      }
      if (backend.api_key === undefined) {
        errors.push({
          path: `backends.${index}.api_key`,
          message: `Backend "${name}" has no api_key; requests to it will fail`,
          severity: "warning",
        });
      }
    }
  });

  if (config.role !== undefined && !resolveRole(config.role, config.roles)) {
    errors.push({
      path: "role",
      message: `Unknown role "${config.role}"; prompts will be sent without one`,
      severity: "warning",
      suggestion: "Run `parley roles` to list the built-in roles",
    });
  }

  return errors;
}

function parseZodErrors(zodError: ZodError): ConfigValidationError[] {
  return zodError.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    severity: "error" as const,
  }));
}
