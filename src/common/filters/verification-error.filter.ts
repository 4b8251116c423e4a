import { ArgumentsHost, Catch, ExceptionFilter } from "@nestjs/common";
import { Response } from "express";
import {
  ModelUnavailableError,
  VerificationError,
} from "../errors/verification.errors";

const MODEL_RETRY_AFTER_SECONDS = 30;

@Catch(VerificationError)
export class VerificationErrorFilter implements ExceptionFilter {
  catch(exception: VerificationError, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    if (exception instanceof ModelUnavailableError) {
      response.setHeader("Retry-After", String(MODEL_RETRY_AFTER_SECONDS));
    }

    response.status(exception.statusCode).json(exception.toResponse());
  }
}
