import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  InternalServerErrorException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';

/**
 * Machine-readable error kinds returned in the `code` field of every error
 * response.
 */
export const ERROR_CODES = {
  INVALID_INPUT: 'INVALID_INPUT',
  UNAUTHORIZED: 'UNAUTHORIZED',
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  DUPLICATE_USER: 'DUPLICATE_USER',
  SLOT_UNAVAILABLE: 'SLOT_UNAVAILABLE',
  RATE_LIMITED: 'RATE_LIMITED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface DomainErrorBody {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

export class InvalidInputException extends BadRequestException {
  constructor(message: string, details?: unknown) {
    super({ code: ERROR_CODES.INVALID_INPUT, message, details } satisfies DomainErrorBody);
  }
}

export class UnauthorizedAccessException extends UnauthorizedException {
  constructor(message = 'Authentication required') {
    super({ code: ERROR_CODES.UNAUTHORIZED, message } satisfies DomainErrorBody);
  }
}

export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({ code: ERROR_CODES.INVALID_CREDENTIALS, message: 'Invalid email or password' } satisfies DomainErrorBody);
  }
}

export class ForbiddenRoleException extends ForbiddenException {
  constructor(message = 'Insufficient role for this operation') {
    super({ code: ERROR_CODES.FORBIDDEN, message } satisfies DomainErrorBody);
  }
}

export class ResourceNotFoundException extends NotFoundException {
  constructor(message: string) {
    super({ code: ERROR_CODES.NOT_FOUND, message } satisfies DomainErrorBody);
  }
}

export class DuplicateUserException extends ConflictException {
  constructor(email: string) {
    super({
      code: ERROR_CODES.DUPLICATE_USER,
      message: `An account with email ${email} already exists`,
    } satisfies DomainErrorBody);
  }
}

export class SlotUnavailableException extends ConflictException {
  readonly slots: readonly string[];

  constructor(slots: readonly string[], reason: 'booked' | 'unknown' = 'booked') {
    const message = reason === 'booked'
      ? `Slots already booked: ${slots.join(', ')}`
      : `Slots do not exist: ${slots.join(', ')}`;
    super({
      code: ERROR_CODES.SLOT_UNAVAILABLE,
      message,
      details: { slots: [...slots], reason },
    } satisfies DomainErrorBody);
    this.slots = slots;
  }
}

export class StorageFailureException extends InternalServerErrorException {
  constructor(message: string) {
    super({ code: ERROR_CODES.INTERNAL_ERROR, message } satisfies DomainErrorBody);
  }
}
