/**
 * Stable error codes carried by BotError subclasses.
 */

export const ErrorCode = {
  TRANSPORT_ERROR: "TRANSPORT_ERROR",
  DECODE_ERROR: "DECODE_ERROR",
  CONFIG_ERROR: "CONFIG_ERROR",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  PERMISSION_DENIED: "PERMISSION_DENIED",
} as const;
