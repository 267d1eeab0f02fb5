import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { QueryFailedError } from 'typeorm';

interface ErrorBody {
  statusCode: number;
  error: string;
  message: string | string[];
  path: string;
  timestamp: string;
}

function describeException(exception: unknown, status: number): Pick<ErrorBody, 'error' | 'message'> {
  if (exception instanceof HttpException) {
    const response = exception.getResponse();
    if (typeof response === 'string') return { error: exception.name, message: response };
    const error = 'error' in response ? response.error : undefined;
    const message = 'message' in response ? response.message : undefined;
    return {
      error: typeof error === 'string' ? error : exception.name,
      message: typeof message === 'string' || Array.isArray(message) ? message : exception.message,
    };
  }
  if (exception instanceof QueryFailedError) {
    return { error: 'Bad Request', message: 'Request conflicts with stored data' };
  }
  // internals stay in the log
  return { error: 'Internal Server Error', message: status >= 500 ? 'Internal server error' : String(exception) };
}

@Catch()
export class AllExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;

    const ctx = host.switchToHttp();

    const httpStatus =
      exception instanceof HttpException
        ? exception.getStatus()
        : exception instanceof QueryFailedError
        ? HttpStatus.BAD_REQUEST
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const path: string = httpAdapter.getRequestUrl(ctx.getRequest());
    if (httpStatus >= 500) {
      const cause = exception instanceof HttpException && exception.cause instanceof Error ? exception.cause : exception;
      this.logger.error(`${path} failed`, cause instanceof Error ? cause.stack : String(cause));
    }

    const responseBody: ErrorBody = {
      statusCode: httpStatus,
      ...describeException(exception, httpStatus),
      path,
      timestamp: new Date().toISOString(),
    };

    httpAdapter.reply(ctx.getResponse(), responseBody, httpStatus);
  }
}
