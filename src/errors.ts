import type { FastifyReply } from 'fastify';
import { msg, type ErrKey } from './lib/error-messages.js';
import type { JobStatus } from './types/job.js';

export type ErrorCode = ErrKey;

export interface ApiError {
  error: string;
  message: string;
  code: ErrorCode;
  details?: unknown;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  INVALID_API_KEY: 401,
  FORBIDDEN: 403,
  SKILL_NOT_FOUND: 404,
  JOB_NOT_FOUND: 404,
  RATE_LIMIT_EXCEEDED: 429,
  INTERNAL_ERROR: 500,
};

const REASON_BY_STATUS: Record<number, string> = {
  400: 'Validation Error',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
};

// Client errors raised by Fastify itself (body parsing, routing)
const FRAMEWORK_REASON_BY_STATUS: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  405: 'Method Not Allowed',
  406: 'Not Acceptable',
  408: 'Request Timeout',
  411: 'Length Required',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  431: 'Request Header Fields Too Large',
};

export function frameworkReason(status: number): string {
  return FRAMEWORK_REASON_BY_STATUS[status] ?? REASON_BY_STATUS[status] ?? 'Client Error';
}

export function errorCodeToStatus(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function errorResponse(code: ErrorCode, details?: unknown): ApiError {
  const status = errorCodeToStatus(code);
  const body: ApiError = {
    error: REASON_BY_STATUS[status] ?? 'Error',
    message: msg(code),
    code,
  };
  if (details !== undefined) body.details = details;
  return body;
}

export function sendError(reply: FastifyReply, code: ErrorCode, details?: unknown): FastifyReply {
  return reply.code(errorCodeToStatus(code)).send(errorResponse(code, details));
}

/** Base for domain errors; `code` is stable and safe to log. */
export class AppError extends Error {
  constructor(public readonly code: string, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidTransitionError extends AppError {
  constructor(public readonly from: JobStatus, public readonly to: JobStatus) {
    super('INVALID_TRANSITION', `Cannot move job from ${from} to ${to}`);
  }
}

export class SkillContentNotFoundError extends AppError {
  constructor(public readonly skillId: string) {
    super('SKILL_CONTENT_NOT_FOUND', `skill ${skillId} has no versions`);
  }
}

export class ExecutorTimeoutError extends AppError {
  constructor(public readonly timeoutMs: number) {
    super('EXECUTOR_TIMEOUT', `executor timed out after ${timeoutMs}ms`);
  }
}

export class ConfigError extends AppError {
  constructor(public readonly issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`);
  }
}

/** Human-readable description of anything thrown by an executor. */
export function describeFault(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
