import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { UpdateErrorCode } from '@tidewater/shared';
import { UpdateError } from './errors';

const STATUS_BY_CODE: Record<UpdateErrorCode, HttpStatus> = {
  [UpdateErrorCode.NOT_FOUND]: HttpStatus.NOT_FOUND,
  [UpdateErrorCode.UNIT_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [UpdateErrorCode.VERSION_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [UpdateErrorCode.BAD_RESPONSE]: HttpStatus.BAD_GATEWAY,
  [UpdateErrorCode.INVALID_RESPONSE]: HttpStatus.BAD_GATEWAY,
  [UpdateErrorCode.BAD_SIGNATURE]: HttpStatus.BAD_GATEWAY,
  [UpdateErrorCode.HASH_MISMATCH]: HttpStatus.BAD_GATEWAY,
  [UpdateErrorCode.EXTRACTION_FAILED]: HttpStatus.INTERNAL_SERVER_ERROR,
};

/**
 * Renders update pipeline failures as `{ error, message }`.
 */
@Catch(UpdateError)
export class UpdateExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(UpdateExceptionFilter.name);

  catch(exception: UpdateError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = STATUS_BY_CODE[exception.code];

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.name}: ${exception.message}`, exception.stack);
    }

    response.status(status).json(exception.toJSON());
  }
}
