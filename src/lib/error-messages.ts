// src/lib/error-messages.ts
export const ERR_MSG = {
  VALIDATION_ERROR: "Request validation failed",
  UNAUTHORIZED: "Missing caller identity",
  INVALID_API_KEY: "Valid x-api-key header required",
  FORBIDDEN: "Forbidden",
  SKILL_NOT_FOUND: "Skill not found",
  JOB_NOT_FOUND: "Job not found",
  RATE_LIMIT_EXCEEDED: "Rate limit exceeded",
  INTERNAL_ERROR: "Something went wrong",
} as const;

export type ErrKey = keyof typeof ERR_MSG;

export function msg(key: ErrKey): string {
  return ERR_MSG[key];
}
