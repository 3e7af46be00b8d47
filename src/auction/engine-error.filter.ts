import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { EngineError, type EngineErrorKind } from './engine';

interface HttpResponse {
  status(code: number): { json(body: unknown): void };
}

export interface EngineErrorBody {
  statusCode: number;
  error: EngineErrorKind;
  message: string;
}

const STATUS_BY_KIND: Partial<Record<EngineErrorKind, HttpStatus>> = {
  Unauthorized: HttpStatus.FORBIDDEN,
  RateLimitExceeded: HttpStatus.TOO_MANY_REQUESTS,
  CooldownPeriod: HttpStatus.TOO_MANY_REQUESTS,
  InvalidSystemState: HttpStatus.SERVICE_UNAVAILABLE,
  EmergencyPaused: HttpStatus.SERVICE_UNAVAILABLE,
  TransferFailed: HttpStatus.BAD_GATEWAY,
  InvalidAuction: HttpStatus.NOT_FOUND,
};

export function httpStatusOf(kind: EngineErrorKind): HttpStatus {
  return STATUS_BY_KIND[kind] ?? HttpStatus.BAD_REQUEST;
}

export function toErrorBody(error: EngineError): EngineErrorBody {
  return {
    statusCode: httpStatusOf(error.kind),
    error: error.kind,
    message: error.message,
  };
}

@Catch(EngineError)
export class EngineErrorFilter implements ExceptionFilter<EngineError> {
  private readonly logger = new Logger(EngineErrorFilter.name);

  catch(exception: EngineError, host: ArgumentsHost): void {
    const body = toErrorBody(exception);
    if (body.statusCode >= 500) {
      this.logger.warn(`${exception.kind}: ${exception.message}`);
    }
    host
      .switchToHttp()
      .getResponse<HttpResponse>()
      .status(body.statusCode)
      .json(body);
  }
}
