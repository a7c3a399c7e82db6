import { HttpStatus } from '@nestjs/common';

export enum ErrorKind {
  INVALID_TRANSITION = 'InvalidTransition',
  FORBIDDEN = 'Forbidden',
  PRICING_NOT_FOUND = 'PricingNotFound',
  INVALID_QUANTITY = 'InvalidQuantity',
  EMPTY_ORDER = 'EmptyOrder',
  INVALID_SCHEDULE = 'InvalidSchedule',
  INSUFFICIENT_POINTS = 'InsufficientPoints',
  NOT_FOUND = 'NotFound',
  CONCURRENCY_CONFLICT = 'ConcurrencyConflict',
  STORAGE_FAILURE = 'StorageFailure',
  VALIDATION_FAILED = 'ValidationFailed',
  CONFLICT = 'Conflict',
  UNAUTHORIZED = 'Unauthorized',
  INTERNAL_ERROR = 'InternalError',
}

export function httpStatusFor(kind: ErrorKind): number {
  switch (kind) {
    case ErrorKind.FORBIDDEN:
      return HttpStatus.FORBIDDEN;
    case ErrorKind.UNAUTHORIZED:
      return HttpStatus.UNAUTHORIZED;
    case ErrorKind.NOT_FOUND:
      return HttpStatus.NOT_FOUND;
    case ErrorKind.CONFLICT:
    case ErrorKind.CONCURRENCY_CONFLICT:
      return HttpStatus.CONFLICT;
    case ErrorKind.STORAGE_FAILURE:
    case ErrorKind.INTERNAL_ERROR:
      return HttpStatus.INTERNAL_SERVER_ERROR;
    default:
      return HttpStatus.UNPROCESSABLE_ENTITY;
  }
}
