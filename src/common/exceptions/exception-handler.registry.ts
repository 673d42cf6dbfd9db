import { Injectable } from '@nestjs/common';
import { IExceptionHandler } from '../interfaces/exception-handler.interface';

/**
 * Ordered list of exception handlers; lower priority numbers are consulted
 * first.
 */
@Injectable()
export class ExceptionHandlerRegistry {
  private readonly handlers: IExceptionHandler[] = [];

  register(handler: IExceptionHandler): void {
    const index = this.handlers.findIndex(
      (existing) => existing.getPriority() > handler.getPriority(),
    );
    if (index === -1) {
      this.handlers.push(handler);
    } else {
      this.handlers.splice(index, 0, handler);
    }
  }

  findHandler(exception: unknown): IExceptionHandler | null {
    return this.handlers.find((handler) => handler.canHandle(exception)) ?? null;
  }

  getHandlers(): IExceptionHandler[] {
    return [...this.handlers];
  }
}
