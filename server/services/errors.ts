/**
 * Failures raised by application services. Routes translate them to an HTTP
 * status with a `{ message }` body.
 */
export class ServiceError extends Error {
  constructor(message: string, readonly status: 400 | 401 | 403 | 404 | 409) {
    super(message);
    this.name = 'ServiceError';
  }

  static badRequest(message: string) {
    return new ServiceError(message, 400);
  }

  static unauthenticated(message = "Not authenticated") {
    return new ServiceError(message, 401);
  }

  static forbidden(message = "Insufficient permissions") {
    return new ServiceError(message, 403);
  }

  static notFound(message: string) {
    return new ServiceError(message, 404);
  }

  static conflict(message: string) {
    return new ServiceError(message, 409);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Reconciliation never throws these; each one becomes a logged event.
export type ReconciliationEvent =
  | { kind: 'transient-read-failure'; projectId: string; operation: string; message: string }
  | { kind: 'write-failure'; projectId: string; operation: string; message: string }
  | { kind: 'degraded-data'; projectId: string; phaseIds: string[] }
  | { kind: 'inconsistent-reference'; projectId: string; reference: string; detail: string }
  | { kind: 'state-conflict'; projectId: string; operation: string; expected: string }
  | { kind: 'status-changed'; projectId: string; from: string; to: string; reason: string }
  | { kind: 'unsuspended'; projectId: string; to: string }
  | { kind: 'delegation-updated'; projectId: string; approverId: string; from: string; to: string }
  | { kind: 'delegation-cleared'; projectId: string; approverId: string };
