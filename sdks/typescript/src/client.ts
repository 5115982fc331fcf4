import type { DocumentUpload, HealthResponse, LeaseVerdict } from './types.js';

export interface LeaseAnalysisClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class LeaseAnalysisError extends Error {
  public readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'LeaseAnalysisError';
    this.status = status;
  }
}

export class LeaseAnalysisClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: LeaseAnalysisClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async analyze(documents: DocumentUpload[]): Promise<LeaseVerdict> {
    if (documents.length === 0) {
      throw new Error('at least one document is required');
    }

    const form = new FormData();
    for (const document of documents) {
      const blob = new Blob([document.data], { type: document.contentType ?? 'application/octet-stream' });
      form.append('files', blob, document.filename);
    }

    // Content-Type is left to fetch so the multipart boundary is set.
    const response = await this.fetchImpl(`${this.baseUrl}/api/analyze_house`, {
      method: 'POST',
      headers: this.defaultHeaders,
      body: form,
    });

    if (!response.ok) {
      const message = await this.readErrorMessage(response);
      throw new LeaseAnalysisError(`Analysis request failed with ${response.status}: ${message}`, response.status);
    }

    return (await response.json()) as LeaseVerdict;
  }

  async health(): Promise<HealthResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/health`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });

    if (!response.ok) {
      const message = await this.readErrorMessage(response);
      throw new LeaseAnalysisError(`Health request failed with ${response.status}: ${message}`, response.status);
    }

    return (await response.json()) as HealthResponse;
  }

  private async readErrorMessage(response: Response): Promise<string> {
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
    if (!text) {
      return '<empty>';
    }
    try {
      const body: unknown = JSON.parse(text);
      if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
        return body.message;
      }
    } catch {
      // not JSON; fall back to the raw text
    }
    return text;
  }
}

export * from './types.js';
