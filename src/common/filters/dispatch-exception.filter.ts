// src/common/filters/dispatch-exception.filter.ts
import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';

import {
  CallClientError,
  CampaignAbortedError,
  CampaignCancelledError,
  InvalidPhoneNumberError,
  ScriptConfigError,
} from '../errors/call-errors';

type DispatchError =
  | CallClientError
  | CampaignAbortedError
  | CampaignCancelledError
  | InvalidPhoneNumberError
  | ScriptConfigError;

/**
 * Last line for domain errors that escape a service without being mapped to
 * an HttpException. Registered globally in main.ts.
 */
@Catch(CallClientError, CampaignAbortedError, CampaignCancelledError, InvalidPhoneNumberError, ScriptConfigError)
export class DispatchExceptionFilter implements ExceptionFilter<DispatchError> {
  private readonly logger = new Logger(DispatchExceptionFilter.name);

  constructor(private readonly adapterHost: HttpAdapterHost) {}

  catch(exception: DispatchError, host: ArgumentsHost): void {
    const { httpAdapter } = this.adapterHost;
    const ctx = host.switchToHttp();
    const { statusCode, body } = DispatchExceptionFilter.toResponse(exception);

    if (statusCode >= 500) this.logger.error(`[${exception.name}] ${exception.message}`);
    else this.logger.warn(`[${exception.name}] ${exception.message}`);

    httpAdapter.reply(ctx.getResponse(), { statusCode, ...body }, statusCode);
  }

  static toResponse(exception: DispatchError): { statusCode: number; body: Record<string, unknown> } {
    if (exception instanceof ScriptConfigError) {
      return {
        statusCode: HttpStatus.BAD_REQUEST,
        body: { message: 'Invalid script config', issues: exception.issues },
      };
    }
    if (exception instanceof InvalidPhoneNumberError) {
      return {
        statusCode: HttpStatus.BAD_REQUEST,
        body: { message: exception.message, errorKind: exception.kind },
      };
    }
    if (exception instanceof CampaignAbortedError) {
      return {
        statusCode: HttpStatus.CONFLICT,
        body: { message: exception.message, campaignId: exception.campaignId, reason: exception.reason },
      };
    }
    if (exception instanceof CampaignCancelledError) {
      return { statusCode: HttpStatus.CONFLICT, body: { message: exception.message } };
    }
    return {
      statusCode: exception.kind === 'AuthError' ? HttpStatus.BAD_GATEWAY : HttpStatus.SERVICE_UNAVAILABLE,
      body: { message: 'Calling provider error', errorKind: exception.kind },
    };
  }
}
