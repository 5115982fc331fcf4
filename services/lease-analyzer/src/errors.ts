import { BadGatewayException, BadRequestException } from "@nestjs/common";

export function describeError(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Rejected input: nothing uploaded, a nameless file, or an unsupported type. */
export class ValidationError extends BadRequestException {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** A file could not be decoded into visual assets. */
export class TransformError extends BadRequestException {
  constructor(
    public readonly filename: string,
    cause: unknown,
  ) {
    super(`failed to process ${filename}: ${describeError(cause)}`, { cause });
    this.name = "TransformError";
  }
}

/** The inference service refused or failed an asset registration. */
export class UpstreamError extends BadGatewayException {
  constructor(
    public readonly filename: string,
    cause: unknown,
  ) {
    super(`failed to register ${filename} with the inference service: ${describeError(cause)}`, { cause });
    this.name = "UpstreamError";
  }
}
