export type ErrorCode =
  | 'PRODUCT_NOT_FOUND'
  | 'ORDER_NOT_FOUND'
  | 'INVALID_RATING'
  | 'SIZE_UNAVAILABLE'
  | 'INVALID_INPUT'
  | 'EXTERNAL_CALL_FAILURE'
  | 'MALFORMED_TOOL_ARGUMENTS'
  | 'UNKNOWN_TOOL'
  | 'MISSING_TOOL_CALL'
  | 'UNEXPECTED_TOOL_CALL';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {}

export class ValidationError extends AppError {}

export class ExternalCallFailure extends AppError {
  constructor(message: string, options: { cause?: unknown; code?: ErrorCode } = {}) {
    super(message, options.code ?? 'EXTERNAL_CALL_FAILURE');
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The model answered outside the shape we asked for. Handled like any other
 * failed external call.
 */
export class ProtocolViolation extends ExternalCallFailure {
  constructor(
    message: string,
    code:
      | 'MALFORMED_TOOL_ARGUMENTS'
      | 'UNKNOWN_TOOL'
      | 'MISSING_TOOL_CALL'
      | 'UNEXPECTED_TOOL_CALL'
  ) {
    super(message, { code });
  }
}

export const productNotFound = (reference: string): NotFoundError =>
  new NotFoundError(`Product not found: ${reference}`, 'PRODUCT_NOT_FOUND');

export const orderNotFound = (orderId: string): NotFoundError =>
  new NotFoundError(`Order not found: ${orderId}`, 'ORDER_NOT_FOUND');

export const invalidRating = (rating: number): ValidationError =>
  new ValidationError(`Rating must be between 1 and 5, got ${rating}`, 'INVALID_RATING');

export const sizeUnavailable = (size: string, productName: string): ValidationError =>
  new ValidationError(`Size ${size} not available for ${productName}`, 'SIZE_UNAVAILABLE');

export const malformedToolArguments = (toolName: string, detail: string): ProtocolViolation =>
  new ProtocolViolation(
    `Malformed arguments for tool ${toolName}: ${detail}`,
    'MALFORMED_TOOL_ARGUMENTS'
  );

export const describeError = (error: unknown): { error: string; stack?: string } =>
  error instanceof Error
    ? { error: error.message, stack: error.stack }
    : { error: 'Unknown error' };
