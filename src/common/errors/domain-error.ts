import { ErrorKind, httpStatusFor } from './error-kinds';

export type FieldErrors = Record<string, string[]>;

export class DomainError extends Error {
  public readonly httpStatus: number;

  constructor(
    public readonly kind: ErrorKind,
    public readonly userMessage: string,
    public readonly fieldErrors?: FieldErrors,
    httpStatus?: number,
  ) {
    super(userMessage);
    this.name = 'DomainError';
    this.httpStatus = httpStatus ?? httpStatusFor(kind);
  }
}
