import { BadRequestException } from '@nestjs/common';

export class InvalidAmountException extends BadRequestException {
  constructor(public readonly amount: string) {
    super(`Amount must be a number greater than zero, got ${amount}`);
  }
}
