export type RiskErrorCode = 'configuration_error' | 'input_shape_error' | 'out_of_domain' | 'invalid_request';

export class RiskEngineError extends Error {
  readonly code: RiskErrorCode;
  readonly statusCode: number;

  constructor(message: string, code: RiskErrorCode, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/** Calibration or band table is unusable. Raised at startup; never recovered. */
export class ConfigurationError extends RiskEngineError {
  constructor(message: string) {
    super(message, 'configuration_error', 500);
  }
}

/** Forecast series does not have 24 consecutive hourly points. */
export class InputShapeError extends RiskEngineError {
  constructor(message: string) {
    super(message, 'input_shape_error', 400);
  }
}

export class OutOfDomainError extends RiskEngineError {
  constructor(message: string) {
    super(message, 'out_of_domain', 422);
  }
}

export class RequestValidationError extends RiskEngineError {
  constructor(message: string) {
    super(message, 'invalid_request', 400);
  }
}
