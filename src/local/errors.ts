import { FailureDescriptor, FailureKind } from '../types/index.js';

export abstract class ControllerError extends Error {
  abstract readonly kind: FailureKind;
  readonly status?: number;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }

  toDescriptor(): FailureDescriptor {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.status !== undefined ? { status: this.status } : {}),
    };
  }
}

export class AuthError extends ControllerError {
  readonly kind = 'auth';
}

export class TransportError extends ControllerError {
  readonly kind = 'transport';
}

export class QueryError extends ControllerError {
  readonly kind = 'query';
  readonly query: string;
  readonly controllerMessage?: string;

  constructor(query: string, controllerMessage: string | undefined, status?: number) {
    super(`${query}: ${controllerMessage ?? 'controller returned rc=error'}`, status);
    this.query = query;
    this.controllerMessage = controllerMessage;
  }

  toDescriptor(): FailureDescriptor {
    return {
      ...super.toDescriptor(),
      query: this.query,
      ...(this.controllerMessage !== undefined ? { controllerMessage: this.controllerMessage } : {}),
    };
  }
}

export class UnknownQueryError extends ControllerError {
  readonly kind = 'unknown_query';
  readonly query: string;

  constructor(query: string) {
    super(`Unknown query: ${query}`);
    this.query = query;
  }

  toDescriptor(): FailureDescriptor {
    return { ...super.toDescriptor(), query: this.query };
  }
}

export function describeFailure(error: unknown): FailureDescriptor {
  if (error instanceof ControllerError) {
    return error.toDescriptor();
  }
  return {
    kind: 'transport',
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}
