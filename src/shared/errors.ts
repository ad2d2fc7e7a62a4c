export enum SimulationErrorCode {
  // Construction errors
  INVALID_BODY = 'INVALID_BODY',
  INVALID_TUNING = 'INVALID_TUNING',
  INVALID_WORLD = 'INVALID_WORLD',
  EMPTY_BODY_LIST = 'EMPTY_BODY_LIST',
  DUPLICATE_BODY_ID = 'DUPLICATE_BODY_ID',

  // Invocation errors
  INVALID_TIMESTEP = 'INVALID_TIMESTEP',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
}

export type ErrorMetadata = Record<string, string | number | boolean | null>;

export class SimulationError extends Error {
  public readonly code: SimulationErrorCode;
  public readonly metadata?: ErrorMetadata;
  public readonly timestamp: number;

  constructor(message: string, code: SimulationErrorCode, metadata?: ErrorMetadata) {
    super(message);
    this.name = 'SimulationError';
    this.code = code;
    this.metadata = metadata;
    this.timestamp = Date.now();
    Object.setPrototypeOf(this, SimulationError.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      metadata: this.metadata,
      timestamp: this.timestamp,
    };
  }
}

// Factory functions for common errors
export function createInvalidBodyError(field: string, value: number | string, rule: string): SimulationError {
  return new SimulationError(
    `Invalid body field ${field}: ${value} (must be ${rule})`,
    SimulationErrorCode.INVALID_BODY,
    { field, value, rule }
  );
}

export function createInvalidTuningError(field: string, value: number, rule: string): SimulationError {
  return new SimulationError(
    `Invalid tuning field ${field}: ${value} (must be ${rule})`,
    SimulationErrorCode.INVALID_TUNING,
    { field, value, rule }
  );
}

export function createInvalidWorldError(field: string, value: number): SimulationError {
  return new SimulationError(
    `Invalid world ${field}: ${value} (must be > 0)`,
    SimulationErrorCode.INVALID_WORLD,
    { field, value }
  );
}

export function createEmptyBodyListError(): SimulationError {
  return new SimulationError('World requires at least one body', SimulationErrorCode.EMPTY_BODY_LIST);
}

export function createDuplicateBodyIdError(id: number): SimulationError {
  return new SimulationError(`Duplicate body id: ${id}`, SimulationErrorCode.DUPLICATE_BODY_ID, { id });
}

export function createInvalidTimestepError(dt: number): SimulationError {
  return new SimulationError(`Invalid timestep: ${dt} (must be > 0)`, SimulationErrorCode.INVALID_TIMESTEP, { dt });
}

export function createInvalidArgumentError(name: string, value: number | string, rule: string): SimulationError {
  return new SimulationError(
    `Invalid ${name}: ${value} (must be ${rule})`,
    SimulationErrorCode.INVALID_ARGUMENT,
    { name, value, rule }
  );
}
