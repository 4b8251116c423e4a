import {
  Body,
  Controller,
  HttpCode,
  Post,
  Req,
  UploadedFile,
  UseInterceptors,
} from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";
import type { Request } from "express";
import { InvalidUploadError } from "../common/errors/verification.errors";
import { getEnv } from "../config/environment";
import {
  CertificateVerificationDto,
  CollegeIdVerificationDto,
} from "./dto/verification-request.dto";
import {
  toVerificationOutcomeResponse,
  type VerificationOutcomeResponse,
} from "./dto/verification-response.dto";
import { validateImageUpload } from "./upload-validation";
import { VerificationOrchestrator } from "./verification-orchestrator.service";
import {
  DocumentKind,
  createVerificationRequest,
  type ClaimedFields,
} from "./verification.types";

const IMAGE_FIELD = "image";

@Controller("verifications")
export class VerificationController {
  constructor(private readonly orchestrator: VerificationOrchestrator) {}

  @Post("college-id")
  @HttpCode(200)
  @UseInterceptors(
    FileInterceptor(IMAGE_FIELD, {
      limits: { fileSize: getEnv().service.maxUploadBytes },
    }),
  )
  async verifyCollegeId(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: CollegeIdVerificationDto,
    @Req() req: Request,
  ): Promise<VerificationOutcomeResponse> {
    return this.verify(DocumentKind.COLLEGE_ID, file, dto, req);
  }

  @Post("certificate")
  @HttpCode(200)
  @UseInterceptors(
    FileInterceptor(IMAGE_FIELD, {
      limits: { fileSize: getEnv().service.maxUploadBytes },
    }),
  )
  async verifyCertificate(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: CertificateVerificationDto,
    @Req() req: Request,
  ): Promise<VerificationOutcomeResponse> {
    return this.verify(DocumentKind.CERTIFICATE, file, dto, req);
  }

  private async verify(
    kind: DocumentKind,
    file: Express.Multer.File | undefined,
    claimed: ClaimedFields,
    req: Request,
  ): Promise<VerificationOutcomeResponse> {
    if (!file) {
      throw new InvalidUploadError([`An "${IMAGE_FIELD}" file is required.`]);
    }

    const errors = validateImageUpload(file, getEnv().service.maxUploadBytes);
    if (errors.length > 0) {
      throw new InvalidUploadError(errors);
    }

    const outcome = await this.orchestrator.verify(
      createVerificationRequest(file.buffer, kind, {
        fullName: claimed.fullName,
        rollNumber: claimed.rollNumber,
        skillLabel: claimed.skillLabel,
        description: claimed.description,
      }),
      { correlationId: req.correlationId },
    );

    return toVerificationOutcomeResponse(outcome);
  }
}
