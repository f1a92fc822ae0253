import { InternalServerErrorException } from '@nestjs/common';

export interface PersistenceErrorBody {
  code: string;
  message: string;
}

/**
 * Raised when a data file cannot be read, parsed or written.
 */
export class PersistenceException extends InternalServerErrorException {
  constructor(
    error: PersistenceErrorBody,
    readonly filePath: string,
    cause?: unknown,
  ) {
    super(
      {
        ...error,
        details: {
          filePath,
          reason: cause instanceof Error ? cause.message : undefined,
        },
      },
      { cause },
    );
  }
}
