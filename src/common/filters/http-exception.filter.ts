import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

const hasMessage = (body: object): body is { message: string | string[] } =>
  'message' in body && (typeof body.message === 'string' || Array.isArray(body.message));

/**
 * Renders every error as HttpExceptionResponse.
 * HttpExceptions keep their status and message; anything else is a 500 and is logged.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const body = this.toBody(exception, request.url);
    response.status(body.statusCode).json(body);
  }

  toBody(exception: unknown, path: string): HttpExceptionResponse {
    const timestamp = new Date().toISOString();

    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const raw = exception.getResponse();
      const message = typeof raw === 'object' && hasMessage(raw) ? raw.message : exception.message;
      return { statusCode, message, error: exception.name, timestamp, path };
    }

    const stack = exception instanceof Error ? exception.stack : String(exception);
    this.logger.error(`Unhandled error on ${path}`, stack);
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'An unexpected error occurred',
      error: 'InternalServerError',
      timestamp,
      path,
    };
  }
}
