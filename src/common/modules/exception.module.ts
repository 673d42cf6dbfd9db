import { Global, Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ExceptionHandlerRegistry } from '../exceptions/exception-handler.registry';
import { HttpExceptionHandler } from '../exceptions/handlers/http-exception.handler';
import { TypeOrmExceptionHandler } from '../exceptions/handlers/typeorm-exception.handler';
import { GlobalExceptionFilter } from '../filters/global-exception.filter';

const exceptionProviders = [
  ExceptionHandlerRegistry,
  HttpExceptionHandler,
  TypeOrmExceptionHandler,
  {
    provide: APP_FILTER,
    useClass: GlobalExceptionFilter,
  },
];

@Global()
@Module({
  providers: exceptionProviders,
  exports: [ExceptionHandlerRegistry],
})
export class ExceptionModule {
  constructor(
    private readonly registry: ExceptionHandlerRegistry,
    private readonly httpHandler: HttpExceptionHandler,
    private readonly typeOrmHandler: TypeOrmExceptionHandler,
  ) {
    this.registry.register(this.httpHandler);
    this.registry.register(this.typeOrmHandler);
  }
}
