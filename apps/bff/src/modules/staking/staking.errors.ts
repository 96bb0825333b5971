import { HttpException, HttpStatus } from '@nestjs/common';

const LOCKED = 423;

export const STAKING_ERROR_STATUS = {
  NotInitialized: HttpStatus.SERVICE_UNAVAILABLE,
  AlreadyInitialized: HttpStatus.CONFLICT,
  StakingPeriodEnded: HttpStatus.CONFLICT,
  StakeLimitExceeded: HttpStatus.CONFLICT,
  CallerNotAssetHolder: HttpStatus.FORBIDDEN,
  EntryNotFound: HttpStatus.NOT_FOUND,
  EntryAlreadyExists: HttpStatus.CONFLICT,
  NotStaked: HttpStatus.CONFLICT,
  CallerNotEntryOwner: HttpStatus.FORBIDDEN,
  ForcedExitRequired: HttpStatus.CONFLICT,
  PastTimestampRequired: HttpStatus.INTERNAL_SERVER_ERROR,
  CustodyTransferFailed: HttpStatus.BAD_GATEWAY,
  Unauthorized: HttpStatus.FORBIDDEN,
  SystemPaused: LOCKED,
  AlreadyPaused: HttpStatus.CONFLICT,
  NotPaused: HttpStatus.CONFLICT,
  ReentrantCall: HttpStatus.CONFLICT,
  InvalidParameter: HttpStatus.BAD_REQUEST
} as const satisfies Record<string, number>;

export type StakingErrorCode = keyof typeof STAKING_ERROR_STATUS;

/**
 * Failure of a ledger precondition. The operation that raised it has been
 * rolled back by the time a caller sees it.
 */
export class StakingException extends HttpException {
  constructor(
    readonly code: StakingErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super({ statusCode: STAKING_ERROR_STATUS[code], error: code, message }, STAKING_ERROR_STATUS[code], options);
  }
}

export function isStakingException(error: unknown, code?: StakingErrorCode): error is StakingException {
  return error instanceof StakingException && (code === undefined || error.code === code);
}
