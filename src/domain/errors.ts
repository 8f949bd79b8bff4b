/**
 * Typed error model.
 *
 * Every failure the library reports carries a TypedError payload: a
 * namespaced code, a retryability flag and machine-actionable fixes. Thrown
 * errors are SliceError subclasses wrapping that payload, so callers can
 * branch on `instanceof` or on `err.code` interchangeably.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'TOPOLOGY'
  | 'SLICE'
  | 'ORCHESTRATOR'
  | 'POLL'
  | 'REMOTE'
  | 'CONFIGURE'
  | 'STATE'
  | 'SETTINGS';

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "TOPOLOGY.DUPLICATE_NAME"). */
  code: string;
  message: string;
  /** Entity (node, component, interface, network service) the error is about. */
  entity?: string;
  sliceName?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  entity?: string;
  sliceName?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    entity: params.entity,
    sliceName: params.sliceName,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Base class for every error thrown by the library. */
export class SliceError extends Error {
  constructor(public readonly typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.name = 'SliceError';
  }

  get code(): string {
    return this.typedError.code;
  }

  get retryable(): boolean {
    return this.typedError.retryable;
  }
}

// --- Local validation errors (never retried, always caller-fixable) ---

export class DuplicateNameError extends SliceError {
  constructor(kind: string, name: string) {
    super(
      createTypedError({
        code: 'TOPOLOGY.DUPLICATE_NAME',
        message: `A ${kind} named "${name}" already exists in this slice`,
        entity: name,
        details: { kind },
        suggestedFixes: [{ type: 'RENAME', params: { name }, description: `Choose a ${kind} name other than "${name}"` }],
      }),
    );
    this.name = 'DuplicateNameError';
  }
}

export class InvalidSpecError extends SliceError {
  constructor(message: string, entity?: string, details?: Record<string, unknown>) {
    super(createTypedError({ code: 'TOPOLOGY.INVALID_SPEC', message, entity, details }));
    this.name = 'InvalidSpecError';
  }
}

export class InvalidTopologyError extends SliceError {
  constructor(message: string, entity?: string, details?: Record<string, unknown>) {
    super(createTypedError({ code: 'TOPOLOGY.INVALID', message, entity, details }));
    this.name = 'InvalidTopologyError';
  }
}

export class InvalidStateError extends SliceError {
  constructor(message: string, entity?: string, details?: Record<string, unknown>) {
    super(createTypedError({ code: 'SLICE.INVALID_STATE', message, entity, details }));
    this.name = 'InvalidStateError';
  }
}

export class UnsupportedModelError extends SliceError {
  constructor(model: string, site: string, supportedModels: string[]) {
    super(
      createTypedError({
        code: 'TOPOLOGY.UNSUPPORTED_MODEL',
        message: `Component model "${model}" cannot be requested at site "${site}"`,
        details: { model, site },
        suggestedFixes: [
          { type: 'USE_MODEL', params: { models: supportedModels }, description: 'Pick a model offered at this site' },
        ],
      }),
    );
    this.name = 'UnsupportedModelError';
  }
}

// --- Orchestrator errors ---

/** Network or HTTP-level failure talking to the orchestrator. Retryable. */
export class TransportError extends SliceError {
  constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(
      createTypedError({
        code: 'ORCHESTRATOR.TRANSPORT',
        message,
        retryable: true,
        details: options?.statusCode !== undefined ? { statusCode: options.statusCode } : undefined,
        suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 } }],
      }),
      { cause: options?.cause },
    );
    this.name = 'TransportError';
  }
}

/** The orchestrator refused the request (infeasible, malformed, over quota). */
export class RejectedError extends SliceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(createTypedError({ code: 'ORCHESTRATOR.REJECTED', message, details }));
    this.name = 'RejectedError';
  }
}

export class PollingFailedError extends SliceError {
  constructor(sliceName: string, attempts: number, lastError: unknown) {
    super(
      createTypedError({
        code: 'POLL.FAILED',
        message: `Polling slice "${sliceName}" failed after ${attempts} consecutive transport errors`,
        sliceName,
        details: { attempts, lastError: lastError instanceof Error ? lastError.message : String(lastError) },
        suggestedFixes: [
          { type: 'INCREASE_RETRIES', params: { maxTransportRetries: attempts * 2 } },
          { type: 'RESUME_WAIT', params: {}, description: 'Call wait() again; the slice keeps its last merged state' },
        ],
      }),
      { cause: lastError },
    );
    this.name = 'PollingFailedError';
  }
}

// --- Remote execution errors ---

export class ConnectError extends SliceError {
  constructor(nodeName: string, attempts: number, message: string, cause?: unknown) {
    super(
      createTypedError({
        code: 'REMOTE.CONNECT',
        message: `Could not reach node "${nodeName}" after ${attempts} attempts: ${message}`,
        entity: nodeName,
        retryable: true,
        details: { attempts },
        suggestedFixes: [{ type: 'WAIT_FOR_SSH', params: {}, description: 'The node may still be booting' }],
      }),
      { cause },
    );
    this.name = 'ConnectError';
  }
}

export class NodeNotReadyError extends SliceError {
  constructor(nodeName: string, reservationState: string) {
    super(
      createTypedError({
        code: 'REMOTE.NODE_NOT_READY',
        message: `Node "${nodeName}" has no management address (reservation state: ${reservationState})`,
        entity: nodeName,
        details: { reservationState },
        suggestedFixes: [{ type: 'WAIT_STABLE', params: {}, description: 'Wait for the slice to become stable first' }],
      }),
    );
    this.name = 'NodeNotReadyError';
  }
}

export class ConfigurationError extends SliceError {
  constructor(nodeName: string, step: string, message: string, details?: Record<string, unknown>) {
    super(
      createTypedError({
        code: 'CONFIGURE.STEP_FAILED',
        message: `Configuring node "${nodeName}" failed at step "${step}": ${message}`,
        entity: nodeName,
        retryable: true,
        details: { step, ...details },
      }),
    );
    this.name = 'ConfigurationError';
  }
}

// --- Persistence and settings ---

export class StateFileError extends SliceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(createTypedError({ code: 'STATE.CORRUPT', message, details }));
    this.name = 'StateFileError';
  }
}

export class SettingsError extends SliceError {
  constructor(errors: string[]) {
    super(
      createTypedError({
        code: 'SETTINGS.INVALID',
        message: `Invalid settings: ${errors.join('; ')}`,
        details: { errors },
      }),
    );
    this.name = 'SettingsError';
  }
}

/**
 * Mask a secret value, keeping only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of the given secrets in a message with their masked form. */
export function maskSecretsInMessage(message: string, secrets: ReadonlyArray<string | undefined>): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of arbitrary secret text
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}
