import multer from 'multer';
import type { ErrorBody } from './types/contracts.js';

export type ErrorKind = 'fail' | 'error';

/**
 * Base for every error that can reach the HTTP boundary. `kind` decides the
 * `status` field of the response body: `fail` for caller mistakes, `error`
 * for faults on our side.
 */
export class ApiError extends Error {
  status: number;
  code: string;
  kind: ErrorKind;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
    this.kind = status < 500 ? 'fail' : 'error';
  }
}

export class ClientError extends ApiError {
  constructor(message: string, code = 'CLIENT_ERROR', status = 400) {
    super(status, code, message);
    this.name = 'ClientError';
  }
}

/** Bytes were uploaded but cannot be decoded as a supported image. */
export class InputError extends ClientError {
  constructor(reason: string) {
    super(`Invalid image input: ${reason}. Please use another photo.`, 'INVALID_IMAGE');
    this.name = 'InputError';
  }
}

export class UnavailableError extends ApiError {
  constructor(message = 'Model is not available') {
    super(500, 'MODEL_UNAVAILABLE', message);
    this.name = 'UnavailableError';
  }
}

export class InferenceError extends ApiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, 'INFERENCE_FAILED', message);
    this.name = 'InferenceError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class UnknownLabelError extends ApiError {
  constructor(label: string) {
    super(500, 'UNKNOWN_LABEL', `No advisory is defined for label "${label}"`);
    this.name = 'UnknownLabelError';
  }
}

export class TimeoutError extends Error {
  constructor(operation: string, ms: number) {
    super(`${operation} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

function uploadErrorMessage(code: string): string {
  switch (code) {
    case 'LIMIT_UNEXPECTED_FILE':
    case 'LIMIT_FILE_COUNT':
      return 'Upload exactly one file in the "image" field';
    case 'LIMIT_PART_COUNT':
    case 'LIMIT_FIELD_COUNT':
    case 'LIMIT_FIELD_KEY':
    case 'LIMIT_FIELD_VALUE':
      return 'Upload form is too large';
    default:
      return 'Upload could not be processed';
  }
}

export function toApiError(error: unknown, maxImageSizeBytes: number): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      return new ClientError(
        `Image exceeds limit of ${Math.floor(maxImageSizeBytes / (1024 * 1024))}MB`,
        'IMAGE_TOO_LARGE',
        413
      );
    }

    return new ClientError(uploadErrorMessage(error.code), 'UPLOAD_ERROR');
  }

  return new ApiError(500, 'INTERNAL_ERROR', 'Internal server error');
}

/** Body sent to the caller. Server-side messages never carry internal detail. */
export function toErrorBody(error: ApiError): ErrorBody {
  if (error.kind === 'fail' || error instanceof UnavailableError) {
    return { status: error.kind, message: error.message };
  }
  return { status: 'error', message: 'Internal server error' };
}
