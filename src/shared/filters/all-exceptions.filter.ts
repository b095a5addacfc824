import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { CustomerNotFoundException } from '../../customer/domain/exceptions/customer-not-found.exception';
import { CustomerEmailConflictException } from '../../customer/domain/exceptions/customer-email-conflict.exception';
import { CustomerValidationException } from '../../customer/domain/exceptions/customer-validation.exception';

interface ErrorDetail {
  field: string;
  constraints: Record<string, string>;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    // Let @nestjs/terminus health-check responses pass through unchanged
    if (exception instanceof HttpException) {
      const exceptionResponse = exception.getResponse();
      if (
        typeof exceptionResponse === 'object' &&
        exceptionResponse !== null &&
        'status' in exceptionResponse &&
        ('info' in exceptionResponse || 'error' in exceptionResponse) &&
        'details' in exceptionResponse
      ) {
        response.status(exception.getStatus()).json(exceptionResponse);
        return;
      }
    }

    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let details: ErrorDetail[] = [];

    if (exception instanceof CustomerNotFoundException) {
      statusCode = HttpStatus.NOT_FOUND;
      message = exception.message;
    } else if (exception instanceof CustomerEmailConflictException) {
      statusCode = HttpStatus.CONFLICT;
      message = exception.message;
    } else if (exception instanceof CustomerValidationException) {
      statusCode = HttpStatus.BAD_REQUEST;
      message = 'Validation failed';
      details = exception.violations.map((v) => ({
        field: v.field,
        constraints: { validation: v.message },
      }));
    } else if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        const responseMessage: unknown =
          'message' in exceptionResponse ? exceptionResponse.message : undefined;

        // Handle class-validator errors
        if (Array.isArray(responseMessage)) {
          message = 'Validation failed';
          details = responseMessage.map((msg) => ({
            field: String(msg).split(' ')[0] || 'unknown',
            constraints: { validation: String(msg) },
          }));
        } else {
          message =
            typeof responseMessage === 'string' && responseMessage !== ''
              ? responseMessage
              : exception.message;
        }
      } else {
        message = String(exceptionResponse);
      }
    }

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} - ${statusCode}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(
        `${request.method} ${request.url} - ${statusCode}: ${message}`,
      );
    }

    response.status(statusCode).json({
      success: false,
      error: {
        statusCode,
        message,
        details,
      },
      timestamp: new Date().toISOString(),
    });
  }
}
