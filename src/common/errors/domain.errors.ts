import {
  BadRequestException,
  ForbiddenException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';

export type ValidationReason =
  | 'missing_file'
  | 'empty_file'
  | 'file_too_large'
  | 'unsupported_format'
  | 'content_type_mismatch'
  | 'invalid_entity_id'
  | 'invalid_image_id'
  | 'missing_filename'
  | 'missing_path'
  | 'caption_too_long';

export class ValidationError extends BadRequestException {
  constructor(
    readonly reason: ValidationReason,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super({ message, code: reason, ...(details && { details }) });
  }
}

export class PermissionError extends ForbiddenException {
  constructor(message = 'You are not allowed to modify this gallery') {
    super({ message, code: 'permission_denied' });
  }
}

export class NotFoundError extends NotFoundException {
  constructor(message: string) {
    super({ message, code: 'not_found' });
  }
}

/**
 * I/O failure against the blob backend. The client only ever sees a generic
 * retryable message; the underlying error is kept as `cause` for the logs.
 */
export class StorageError extends ServiceUnavailableException {
  constructor(
    readonly operation: 'write' | 'delete' | 'read',
    readonly path: string,
    cause?: unknown,
  ) {
    super(
      { message: 'Storage is temporarily unavailable, please retry', code: 'storage_unavailable' },
      { cause },
    );
  }
}

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
