export interface LeaseVerdict {
  excessive_loan: boolean;
  rights_restriction: boolean;
  trust_property: boolean;
  residential_use: boolean;
  tax_delinquency: boolean;
  owner_verification: boolean;
}

export interface DocumentUpload {
  filename: string;
  data: Uint8Array;
  contentType?: string;
}

export interface HealthResponse {
  status: string;
}
