import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { isRole, ROLES, type Role } from '../engine';

@Injectable()
export class ParseRolePipe implements PipeTransform<unknown, Role> {
  transform(value: unknown): Role {
    if (!isRole(value)) {
      throw new BadRequestException(
        `role must be one of ${ROLES.join(', ')}`,
      );
    }
    return value;
  }
}
