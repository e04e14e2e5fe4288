export type ErrorKind = 'InvalidArgument' | 'NotFound' | 'InvalidHierarchy' | 'StorageFailure';

export type HierarchyReason = 'bad-nesting' | 'cross-project' | 'depth-exceeded' | 'missing-parent';

export interface ErrorPayload {
  kind: ErrorKind;
  message: string;
  reason?: HierarchyReason;
}

export class WorkPlanError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    readonly reason?: HierarchyReason,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'WorkPlanError';
  }

  toPayload(): ErrorPayload {
    return this.reason ? { kind: this.kind, message: this.message, reason: this.reason } : { kind: this.kind, message: this.message };
  }
}

export class InvalidArgumentError extends WorkPlanError {
  constructor(message: string) {
    super('InvalidArgument', message);
    this.name = 'InvalidArgumentError';
  }
}

export class NotFoundError extends WorkPlanError {
  constructor(message: string, reason?: HierarchyReason) {
    super('NotFound', message, reason);
    this.name = 'NotFoundError';
  }
}

export class InvalidHierarchyError extends WorkPlanError {
  constructor(reason: HierarchyReason, message: string) {
    super('InvalidHierarchy', message, reason);
    this.name = 'InvalidHierarchyError';
  }
}

export class StorageFailureError extends WorkPlanError {
  constructor(message: string, cause?: unknown) {
    super('StorageFailure', message, undefined, { cause });
    this.name = 'StorageFailureError';
  }
}

export function isWorkPlanError(e: unknown): e is WorkPlanError {
  return e instanceof WorkPlanError;
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
