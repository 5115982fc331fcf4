import { HttpException, Inject, Injectable, InternalServerErrorException, Logger } from "@nestjs/common";

import { describeError } from "../errors.js";
import { resolveVerdict } from "../policy.js";
import { AssetRegistrar } from "../pipeline/asset-registrar.js";
import { classifyUploads } from "../pipeline/classifier.js";
import { ImageInspector } from "../pipeline/image-inspector.js";
import { BoundedInvoker } from "../pipeline/invoker.js";
import { PdfRasterizer } from "../pipeline/pdf-rasterizer.js";
import { assembleRequest } from "../pipeline/prompt.js";
import type { InboundUpload, SourceDocument, Verdict, VisualAsset } from "../types.js";

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    @Inject(ImageInspector) private readonly imageInspector: ImageInspector,
    @Inject(PdfRasterizer) private readonly rasterizer: PdfRasterizer,
    @Inject(AssetRegistrar) private readonly registrar: AssetRegistrar,
    @Inject(BoundedInvoker) private readonly invoker: BoundedInvoker,
  ) {}

  async analyze(uploads: readonly InboundUpload[]): Promise<Verdict> {
    try {
      const documents = classifyUploads(uploads);
      const assets = await this.collectAssets(documents);
      const references = await this.registrar.registerAll(assets);
      const outcome = await this.invoker.invoke(assembleRequest(references));

      const resolution = resolveVerdict(outcome);
      if (resolution.source === "fallback") {
        const detail = resolution.detail ? ` (${resolution.detail})` : "";
        this.logger.warn(`Returning fallback verdict: ${resolution.reason}${detail}`);
      }
      return resolution.verdict;
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      this.logger.error(`Analysis failed: ${describeError(error)}`);
      throw new InternalServerErrorException(`analysis failed: ${describeError(error)}`, { cause: error });
    }
  }

  /** Documents in upload order; pages in page order within each PDF. */
  private async collectAssets(documents: readonly SourceDocument[]): Promise<VisualAsset[]> {
    const assets: VisualAsset[] = [];
    for (const document of documents) {
      if (document.kind === "image") {
        assets.push(await this.imageInspector.toAsset(document));
        continue;
      }
      assets.push(...(await this.rasterizer.toAssets(document)));
    }
    return assets;
  }
}
