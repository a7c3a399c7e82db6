import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import * as Sentry from '@sentry/node';
import { RequestContextService } from '../context/request-context.service';
import { DomainError, ErrorKind, FieldErrors } from '../errors';

export interface ErrorBody {
  success: false;
  error_kind: ErrorKind;
  message: string;
  field_errors?: FieldErrors;
  correlationId?: string;
}

function kindForStatus(status: number): ErrorKind {
  switch (status) {
    case HttpStatus.UNAUTHORIZED:
      return ErrorKind.UNAUTHORIZED;
    case HttpStatus.FORBIDDEN:
      return ErrorKind.FORBIDDEN;
    case HttpStatus.NOT_FOUND:
      return ErrorKind.NOT_FOUND;
    case HttpStatus.CONFLICT:
      return ErrorKind.CONFLICT;
    default:
      return status >= 500 ? ErrorKind.INTERNAL_ERROR : ErrorKind.VALIDATION_FAILED;
  }
}

function messageOf(res: string | object, fallback: string): string {
  if (typeof res === 'string') return res;
  if ('message' in res) {
    const { message } = res;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.join('; ');
  }
  return fallback;
}

/** Normalizes any thrown value into the error body and logs it once. */
export function toErrorBody(exception: unknown): { status: number; body: ErrorBody } {
  if (exception instanceof DomainError) {
    return {
      status: exception.httpStatus,
      body: {
        success: false,
        error_kind: exception.kind,
        message: exception.userMessage,
        field_errors: exception.fieldErrors,
      },
    };
  }
  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    return {
      status,
      body: {
        success: false,
        error_kind: kindForStatus(status),
        message: messageOf(exception.getResponse(), exception.message),
      },
    };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: { success: false, error_kind: ErrorKind.INTERNAL_ERROR, message: 'Internal server error' },
  };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(private readonly context: RequestContextService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const header = request.headers['x-correlation-id'];
    const correlationId = this.context.get('correlationId') || (typeof header === 'string' ? header : undefined);
    const userId = this.context.get('userId');
    const { status, body } = toErrorBody(exception);

    const logPayload = {
      correlationId,
      userId,
      path: request.path,
      method: request.method,
      status,
      errorKind: body.error_kind,
      message: body.message,
    };
    if (status >= 500) {
      Sentry.captureException(exception, {
        tags: { correlationId: correlationId || '', userId: userId || '' },
        extra: { path: request.path, method: request.method },
        user: userId ? { id: userId } : undefined,
      });
      this.logger.error(logPayload, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(logPayload);
    }

    if (response.headersSent) {
      return;
    }
    response.status(status).json({ ...body, correlationId });
  }
}
