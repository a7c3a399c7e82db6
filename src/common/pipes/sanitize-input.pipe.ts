import { ArgumentMetadata, Injectable, PipeTransform } from '@nestjs/common';
import { deepSanitize } from '../utils/sanitize.util';

@Injectable()
export class SanitizeInputPipe implements PipeTransform {
  transform(value: unknown, metadata: ArgumentMetadata) {
    if (!value) return value;
    if (metadata.type === 'body' || metadata.type === 'query' || metadata.type === 'param') {
      return deepSanitize(value);
    }
    return value;
  }
}
