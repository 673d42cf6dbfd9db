import { ArgumentsHost } from '@nestjs/common';

export interface IExceptionHandler {
  canHandle(exception: unknown): boolean;
  handle(exception: unknown, host: ArgumentsHost): ErrorResponse;
  getPriority(): number;
}

export interface ErrorResponse {
  statusCode: number;
  message: string | string[];
  error: string;
  timestamp: string;
  path: string;
  requestId: string;
}
