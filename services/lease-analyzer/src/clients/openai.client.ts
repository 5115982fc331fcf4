import { extname } from "node:path";

import { Inject, Injectable } from "@nestjs/common";
import OpenAI, { toFile } from "openai";

import type { AppConfig } from "../config.js";
import { APP_CONFIG } from "../tokens.js";
import {
  assetLabel,
  type AssetReference,
  type InferenceGateway,
  type InferenceRequest,
  type VisualAsset,
} from "../types.js";

export const ASSET_PURPOSE = "vision";

const MIME_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".bmp": "image/bmp",
  ".webp": "image/webp",
  ".gif": "image/gif",
};

function mimeTypeFor(label: string): string {
  return MIME_TYPES[extname(label).toLowerCase()] ?? "application/octet-stream";
}

/** Files API for asset registration, Responses API for the completion. */
@Injectable()
export class OpenAiGateway implements InferenceGateway {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    const { apiKey, baseUrl, model } = config.inference;
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY environment variable is required");
    }
    // The pipeline never retries a call.
    this.client = new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });
    this.model = model;
  }

  async registerAsset(asset: VisualAsset): Promise<AssetReference> {
    const label = assetLabel(asset);
    const file = await this.client.files.create({
      file: await toFile(asset.bytes, label, { type: mimeTypeFor(label) }),
      purpose: ASSET_PURPOSE,
    });
    return { handle: file.id };
  }

  async complete(request: InferenceRequest, signal: AbortSignal): Promise<string> {
    const response = await this.client.responses.create(
      {
        model: this.model,
        input: [
          {
            role: "user",
            content: [
              { type: "input_text", text: request.instructionText },
              ...request.assetRefs.map((ref) => ({
                type: "input_image" as const,
                file_id: ref.handle,
                detail: "auto" as const,
              })),
            ],
          },
        ],
      },
      { signal },
    );
    return response.output_text;
  }
}
