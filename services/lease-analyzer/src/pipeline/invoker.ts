import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import { describeError } from "../errors.js";
import { APP_CONFIG, INFERENCE_GATEWAY } from "../tokens.js";
import type { InferenceGateway, InferenceOutcome, InferenceRequest } from "../types.js";

@Injectable()
export class BoundedInvoker {
  private readonly logger = new Logger(BoundedInvoker.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(INFERENCE_GATEWAY) private readonly gateway: InferenceGateway,
  ) {}

  /**
   * Races the completion call against the deadline. Losing the race aborts
   * the local request and yields `timed_out`; the remote side may still
   * finish. Never rejects.
   */
  async invoke(request: InferenceRequest): Promise<InferenceOutcome> {
    const { timeoutMs } = this.config.inference;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<InferenceOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ status: "timed_out" });
      }, timeoutMs);
    });

    const call = this.gateway.complete(request, controller.signal).then<InferenceOutcome, InferenceOutcome>(
      (rawText) => ({ status: "success", rawText }),
      (error: unknown) => ({ status: "upstream_failure", reason: describeError(error) }),
    );

    this.logger.log(`Submitting inference request with ${request.assetRefs.length} asset(s)`);
    const startedAt = Date.now();
    try {
      const outcome = await Promise.race([call, deadline]);
      switch (outcome.status) {
        case "success":
          this.logger.log(`Inference response received in ${Date.now() - startedAt}ms`);
          break;
        case "timed_out":
          this.logger.warn(`Inference request abandoned after ${timeoutMs}ms`);
          break;
        case "upstream_failure":
          this.logger.error(`Inference request failed: ${outcome.reason}`);
          break;
      }
      return outcome;
    } finally {
      clearTimeout(timer);
    }
  }
}
