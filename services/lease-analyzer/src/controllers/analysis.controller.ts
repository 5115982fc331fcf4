import { Controller, HttpCode, HttpStatus, Inject, Post, UploadedFiles, UseInterceptors } from "@nestjs/common";
import { FilesInterceptor } from "@nestjs/platform-express";

import { VerdictResponseDto } from "../dto/verdict-response.dto.js";
import { decodeMultipartFilename } from "../pipeline/classifier.js";
import { AnalysisService } from "../services/analysis.service.js";
import type { InboundUpload } from "../types.js";

@Controller("api")
export class AnalysisController {
  constructor(
    @Inject(AnalysisService)
    private readonly analysisService: AnalysisService,
  ) {}

  @Post("analyze_house")
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FilesInterceptor("files"))
  async analyzeHouse(@UploadedFiles() files: InboundUpload[] | undefined): Promise<VerdictResponseDto> {
    const uploads = (files ?? []).map((file) => ({
      originalname: file.originalname === undefined ? undefined : decodeMultipartFilename(file.originalname),
      buffer: file.buffer,
    }));
    const verdict = await this.analysisService.analyze(uploads);
    return {
      excessive_loan: verdict.excessive_loan,
      rights_restriction: verdict.rights_restriction,
      trust_property: verdict.trust_property,
      residential_use: verdict.residential_use,
      tax_delinquency: verdict.tax_delinquency,
      owner_verification: verdict.owner_verification,
    };
  }
}
