/**
 * Error hierarchy for the bot.
 */

import { ErrorCode } from "./codes.js";

export class BotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BotError";
  }
}

/** History or backend I/O failed. */
export class TransportError extends BotError {
  constructor(
    public readonly transport: string,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(`Transport "${transport}" error: ${message}`, options?.code ?? ErrorCode.TRANSPORT_ERROR, options);
    this.name = "TransportError";
  }
}

/** Backend output could not be decoded. */
export class DecodeError extends BotError {
  constructor(
    public readonly stream: string,
    options?: { cause?: unknown },
  ) {
    super(`Error decoding ${stream}`, ErrorCode.DECODE_ERROR, options);
    this.name = "DecodeError";
  }
}

export class ConfigError extends BotError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/** A user-supplied value (model name, command argument) was rejected. */
export class ValidationError extends BotError {
  constructor(message: string) {
    super(message, ErrorCode.VALIDATION_ERROR);
    this.name = "ValidationError";
  }
}

/** The server refused a room change (name, topic). */
export class PermissionError extends BotError {
  constructor(
    public readonly action: string,
    options?: { cause?: unknown },
  ) {
    super(`Permission denied: ${action}`, ErrorCode.PERMISSION_DENIED, options);
    this.name = "PermissionError";
  }
}
