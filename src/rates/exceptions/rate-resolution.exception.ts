import { HttpStatus } from '@nestjs/common';

export abstract class RateResolutionException extends Error {
  abstract readonly httpStatus: HttpStatus;

  protected constructor(message: string, name: string) {
    super(message);
    this.name = name;
  }
}
