import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';

type ErrorPayload = {
  statusCode: number;
  message: string;
  code?: string;
  details?: Record<string, unknown>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readMessage = (value: unknown, fallback: string) => {
  if (typeof value === 'string') return value;
  // class-validator failures come through as a list of messages
  if (Array.isArray(value)) return value.map(String).join('; ');
  return fallback;
};

export const toErrorPayload = (exception: unknown): ErrorPayload => {
  if (!(exception instanceof HttpException)) {
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
    };
  }

  const statusCode = exception.getStatus();
  const response = exception.getResponse();
  if (!isRecord(response)) {
    return { statusCode, message: readMessage(response, exception.message) };
  }

  const payload: ErrorPayload = {
    statusCode,
    message: readMessage(response.message, exception.message),
  };
  if (typeof response.code === 'string') {
    payload.code = response.code;
  }
  if (isRecord(response.details)) {
    payload.details = response.details;
  }
  return payload;
};

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger('ExceptionsHandler');

  catch(exception: unknown, host: ArgumentsHost) {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const payload = toErrorPayload(exception);

    if (payload.statusCode >= 500) {
      const cause =
        exception instanceof Error && exception.cause !== undefined
          ? exception.cause
          : exception;
      this.logger.error(
        `Unhandled exception: ${payload.message}`,
        cause instanceof Error ? cause.stack : String(cause),
      );
    }

    reply.status(payload.statusCode).send(payload);
  }
}
