export class SingleConnectionRpcError extends Error {
  public readonly code: string;

  constructor(params: { code: string; message: string; cause?: unknown }) {
    super(params.message, { cause: params.cause });
    this.name = new.target.name;
    this.code = params.code;
  }
}

/**
 * Raised when a transport operation sees no readiness within its timeout.
 * Callers that poll (accept loop, worker command wait) treat it as a retry
 * point, never as a broken connection.
 */
export class TransportTimeoutError extends SingleConnectionRpcError {
  constructor(params: { message?: string; cause?: unknown } = {}) {
    super({
      code: 'transport_timeout',
      message: params.message ?? 'Operation timed out.',
      cause: params.cause
    });
  }
}

export class TransportError extends SingleConnectionRpcError {
  constructor(params: { message: string; cause?: unknown; code?: string }) {
    super({
      code: params.code ?? 'transport_error',
      message: params.message,
      cause: params.cause
    });
  }
}

export class FramingError extends TransportError {
  constructor(params: { message: string; cause?: unknown }) {
    super({ code: 'framing_error', message: params.message, cause: params.cause });
  }
}

export class ConnectionError extends TransportError {
  constructor(params: { message: string; cause?: unknown }) {
    super({ code: 'connection_error', message: params.message, cause: params.cause });
  }
}

export class DuplicateFunctionError extends SingleConnectionRpcError {
  public readonly function_name: string;

  constructor(params: { function_name: string }) {
    super({
      code: 'duplicate_function',
      message: `The function name ${params.function_name} is already taken.`
    });
    this.function_name = params.function_name;
  }
}

export class InvalidRegistrationError extends SingleConnectionRpcError {
  constructor(params: { message: string }) {
    super({ code: 'invalid_registration', message: params.message });
  }
}

export class ServerStateError extends SingleConnectionRpcError {
  constructor(params: { message: string }) {
    super({ code: 'server_state_error', message: params.message });
  }
}

export class MarshalingError extends SingleConnectionRpcError {
  constructor(params: { message: string; cause?: unknown }) {
    super({ code: 'marshaling_error', message: params.message, cause: params.cause });
  }
}

/** The connection is gone; the next call reconnects. */
export class CommunicationError extends SingleConnectionRpcError {
  constructor(params: { message: string; cause?: unknown }) {
    super({ code: 'communication_error', message: params.message, cause: params.cause });
  }
}

export class RemoteError extends SingleConnectionRpcError {
  constructor(params: { message: string; cause?: unknown; code?: string }) {
    super({
      code: params.code ?? 'remote_error',
      message: params.message,
      cause: params.cause
    });
  }
}

export class RemoteExceptionError extends RemoteError {
  public readonly remote_error: Error;

  constructor(params: { remote_error: Error }) {
    super({
      code: 'remote_exception',
      message: `Remote function raised ${params.remote_error.name}: ${params.remote_error.message}`,
      cause: params.remote_error
    });
    this.remote_error = params.remote_error;
  }
}

/** An error rebuilt from its serialized record on the receiving side. */
export class ReconstructedError extends Error {
  public readonly code: string | number | null;

  constructor(params: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  }) {
    super(params.message);
    this.name = params.name;
    this.code = params.code ?? null;
    if (params.stack !== undefined) {
      this.stack = params.stack;
    }
  }
}

export function GetErrorMessage(params: { error: unknown }): string {
  if (params.error instanceof Error) {
    return params.error.message;
  }
  if (typeof params.error === 'string') {
    return params.error;
  }
  return 'Unknown error.';
}

export function NormalizeThrownValue(params: { error: unknown }): Error {
  if (params.error instanceof Error) {
    return params.error;
  }

  return new Error(
    typeof params.error === 'string' ? params.error : `Non-error value thrown: ${String(params.error)}`
  );
}
