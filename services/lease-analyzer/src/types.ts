export type DocumentKind = "image" | "pdf";

/** A file as it arrives from the multipart parser. */
export interface InboundUpload {
  originalname?: string;
  buffer: Buffer;
}

export interface SourceDocument {
  readonly index: number;
  readonly filename: string;
  readonly kind: DocumentKind;
  readonly bytes: Buffer;
}

export interface Page {
  readonly documentIndex: number;
  /** Zero-based position within the owning document. */
  readonly pageIndex: number;
  readonly pageNumber: number;
  readonly raster: Buffer;
}

export interface ImageAsset {
  readonly kind: "image";
  readonly documentIndex: number;
  readonly filename: string;
  readonly bytes: Buffer;
}

export interface PageAsset {
  readonly kind: "page";
  readonly documentIndex: number;
  readonly pageIndex: number;
  readonly filename: string;
  readonly bytes: Buffer;
}

export type VisualAsset = ImageAsset | PageAsset;

export interface AssetReference {
  readonly handle: string;
}

export interface InferenceRequest {
  readonly instructionText: string;
  readonly assetRefs: readonly AssetReference[];
}

export type InferenceOutcome =
  | { status: "success"; rawText: string }
  | { status: "timed_out" }
  | { status: "upstream_failure"; reason: string };

export interface Verdict {
  excessive_loan: boolean;
  rights_restriction: boolean;
  trust_property: boolean;
  residential_use: boolean;
  tax_delinquency: boolean;
  owner_verification: boolean;
}

export type FallbackReason = "timed_out" | "upstream_failure" | "extraction_failed";

export type VerdictResolution =
  | { source: "model"; verdict: Verdict }
  | { source: "fallback"; verdict: Verdict; reason: FallbackReason; detail?: string };

/**
 * Boundary to the external multimodal service. Implementations must keep
 * asset order: the model tells documents apart only by position.
 */
export interface InferenceGateway {
  registerAsset(asset: VisualAsset): Promise<AssetReference>;
  complete(request: InferenceRequest, signal: AbortSignal): Promise<string>;
}

export function assetLabel(asset: VisualAsset): string {
  return asset.kind === "image"
    ? asset.filename
    : `${asset.filename}_page_${asset.pageIndex + 1}.png`;
}
