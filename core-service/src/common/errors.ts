/**
 * Errors shared by every service: message helpers, `ServiceError` with
 * service-prefixed codes, and the registry mapping codes to HTTP statuses.
 */

import { logger, getCorrelationId } from './logger.js';

// ═══════════════════════════════════════════════════════════════════
// Messages
// ═══════════════════════════════════════════════════════════════════

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error !== null && typeof error === 'object' && 'message' in error) return String(error.message);
  return String(error);
}

/** Message plus stack, for log lines */
export function normalizeError(error: unknown): { message: string; stack?: string } {
  return error instanceof Error ? { message: error.message, stack: error.stack } : { message: getErrorMessage(error) };
}

// ═══════════════════════════════════════════════════════════════════
// Service Errors
// ═══════════════════════════════════════════════════════════════════

/**
 * "prize not found" and "prize_not_found" both become "PrizeNotFound".
 * Input that already starts upper-case is taken as a finished code.
 */
export function formatToCapitalCamelCase(text: string): string {
  if (!text) return 'RuntimeError';
  if (/^[A-Z]/.test(text)) return text;

  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean)
    .map(word => word[0].toUpperCase() + word.slice(1))
    .join('');
}

/**
 * Error with a service-prefixed code ("MSRewardsPrizeNotFound") as its
 * message, details under `extensions` and the status registered for the code.
 * Logged when constructed.
 */
export class ServiceError extends Error {
  public extensions: Record<string, unknown>;
  public readonly code: string;
  public readonly status: number;

  constructor(type: string, details?: Record<string, unknown>) {
    const code = formatToCapitalCamelCase(type);
    super(code);

    this.name = 'ServiceError';
    this.code = code;
    this.status = getErrorStatus(code);
    this.extensions = { ...details, code };

    Error.captureStackTrace(this, ServiceError);

    logger.error('Service Error', {
      code,
      status: this.status,
      details: this.extensions,
      correlationId: getCorrelationId(),
    });
  }

  /** Service errors pass through; anything else is wrapped */
  static format(error: unknown): ServiceError {
    if (error instanceof ServiceError) return error;
    const message = getErrorMessage(error);
    return new ServiceError(formatToCapitalCamelCase(message), { originalError: message });
  }

  /** Body sent to callers; the stack stays in the logs */
  toResponse(): { status: number; body: { error: string; details: Record<string, unknown> } } {
    return { status: this.status, body: { error: this.code, details: this.extensions } };
  }
}

/** createServiceError('rewards', 'prize not found') has code "MSRewardsPrizeNotFound" */
export function createServiceError(service: string, errorType: string, details?: Record<string, unknown>): ServiceError {
  const prefix = `MS${service.charAt(0).toUpperCase()}${service.slice(1)}`;
  return new ServiceError(prefix + formatToCapitalCamelCase(errorType), details);
}

// ═══════════════════════════════════════════════════════════════════
// Code registry
// ═══════════════════════════════════════════════════════════════════

const knownCodes = new Set<string>();
const statusByCode = new Map<string, number>();

/** Each service registers its codes at startup; unregistered codes map to 500 */
export function registerServiceErrorCodes(codes: readonly string[], statuses: Readonly<Record<string, number>> = {}): void {
  for (const code of codes) knownCodes.add(code);
  for (const [code, status] of Object.entries(statuses)) statusByCode.set(code, status);
}

export function getAllErrorCodes(): string[] {
  return [...knownCodes].sort();
}

export function getErrorStatus(code: string): number {
  return statusByCode.get(code) ?? 500;
}

/** "MSRewardsPrizeNotFound" gives "Rewards" */
export function extractServiceFromCode(code: string): string | null {
  return /^MS([A-Z][a-z]+)/.exec(code)?.[1] ?? null;
}
