import { Module } from "@nestjs/common";

import { OpenAiGateway } from "./clients/openai.client.js";
import { loadConfig } from "./config.js";
import { AnalysisController } from "./controllers/analysis.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { AssetRegistrar } from "./pipeline/asset-registrar.js";
import { ImageInspector } from "./pipeline/image-inspector.js";
import { BoundedInvoker } from "./pipeline/invoker.js";
import { PdfRasterizer } from "./pipeline/pdf-rasterizer.js";
import { AnalysisService } from "./services/analysis.service.js";
import { APP_CONFIG, INFERENCE_GATEWAY } from "./tokens.js";

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const gatewayProvider = {
  provide: INFERENCE_GATEWAY,
  useClass: OpenAiGateway,
};

@Module({
  imports: [],
  controllers: [AnalysisController, HealthController],
  providers: [
    configProvider,
    gatewayProvider,
    ImageInspector,
    PdfRasterizer,
    AssetRegistrar,
    BoundedInvoker,
    AnalysisService,
  ],
})
export class AppModule {}
