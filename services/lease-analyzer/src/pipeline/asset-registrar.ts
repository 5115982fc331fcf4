import { Inject, Injectable, Logger } from "@nestjs/common";

import { UpstreamError, describeError } from "../errors.js";
import { INFERENCE_GATEWAY } from "../tokens.js";
import { assetLabel, type AssetReference, type InferenceGateway, type VisualAsset } from "../types.js";

@Injectable()
export class AssetRegistrar {
  private readonly logger = new Logger(AssetRegistrar.name);

  constructor(@Inject(INFERENCE_GATEWAY) private readonly gateway: InferenceGateway) {}

  /**
   * One call per asset, strictly sequential, so the returned references line
   * up with submission order. Handles registered before a failure are left
   * in the store.
   */
  async registerAll(assets: readonly VisualAsset[]): Promise<AssetReference[]> {
    const references: AssetReference[] = [];
    for (const asset of assets) {
      try {
        const reference = await this.gateway.registerAsset(asset);
        this.logger.log(`Registered ${assetLabel(asset)} as ${reference.handle}`);
        references.push(reference);
      } catch (error) {
        this.logger.error(`Asset registration failed for ${assetLabel(asset)}: ${describeError(error)}`);
        throw new UpstreamError(asset.filename, error);
      }
    }
    return references;
  }
}
