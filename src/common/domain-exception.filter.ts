import { ArgumentsHost, Catch, ExceptionFilter, HttpException, Logger } from '@nestjs/common';
import { Response } from 'express';
import { DomainError } from './errors';

type ErrorBody = {
  status: number;
  message: string;
  extra: Record<string, unknown>;
};

function describe(exception: unknown): ErrorBody {
  if (exception instanceof DomainError) {
    return { status: exception.status, message: exception.message, extra: exception.extra() };
  }
  if (exception instanceof HttpException) {
    return { status: exception.getStatus(), message: exception.message, extra: {} };
  }
  return { status: 500, message: 'Internal Server Error', extra: {} };
}

@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, message, extra } = describe(exception);
    if (status >= 500) {
      this.logger.error(
        exception instanceof Error ? exception.message : String(exception),
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${status} ${message}`);
    }
    response.status(status).json({ error: { message, status, ...extra } });
  }
}
