import { ValidationError } from 'class-validator';
import { DomainError, ErrorKind, FieldErrors } from '../errors';

function collect(errors: ValidationError[], prefix: string, into: FieldErrors) {
  for (const error of errors) {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    if (error.constraints) {
      into[path] = Object.values(error.constraints);
    }
    if (error.children?.length) {
      collect(error.children, path, into);
    }
  }
  return into;
}

/** ValidationPipe hook: reports every failing property under its dotted path. */
export function validationExceptionFactory(errors: ValidationError[]) {
  return new DomainError(ErrorKind.VALIDATION_FAILED, 'Validation failed', collect(errors, '', {}));
}
