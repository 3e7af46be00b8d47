import {
  ArgumentMetadata,
  BadRequestException,
  Injectable,
  PipeTransform,
} from '@nestjs/common';

/** Trimmed, non-empty string; anything else is a 400. */
@Injectable()
export class RequiredStringPipe implements PipeTransform<unknown, string> {
  transform(value: unknown, metadata: ArgumentMetadata): string {
    const trimmed = typeof value === 'string' ? value.trim() : '';
    if (!trimmed) {
      throw new BadRequestException(
        `${metadata.data ?? 'value'} must be a non-empty string`,
      );
    }
    return trimmed;
  }
}
