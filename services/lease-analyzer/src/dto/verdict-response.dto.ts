import type { Verdict } from "../types.js";

export class VerdictResponseDto implements Verdict {
  excessive_loan!: boolean;
  rights_restriction!: boolean;
  trust_property!: boolean;
  residential_use!: boolean;
  tax_delinquency!: boolean;
  owner_verification!: boolean;
}
