import type { AssetReference, InferenceRequest } from "../types.js";

/**
 * Rubric sent ahead of the document images. Kept literal so every request
 * carries the same auditable text.
 */
export const ANALYSIS_INSTRUCTIONS = `**Important**: read the text of the provided documents carefully. Base every judgement only on concrete evidence stated in the documents.

Decide the following six items accurately, based on the document contents:

**1. Excessive loans (excessive_loan)**
- Check section "을구" of the real-estate register, or any debt / mortgage (근저당) section.
- Judge whether registered mortgage amounts or maximum secured claims (채권최고액) are excessively high.
- Check whether many debt entries are recorded.
- Evidence: the concrete amounts in the document. If no debt amount is recorded, answer false.

**2. Rights restrictions (rights_restriction)**
- Check section "갑구" of the real-estate register.
- Look for seizure (압류), provisional seizure (가압류), prohibition of disposal (처분금지) or provisional disposition (가처분).
- Evidence: the restriction text stated in the document.

**3. Trust property (trust_property)**
- Check the real-estate register for trust (신탁) entries.
- Check whether ownership is held by a trust company or trust bank.
- Evidence: explicit trust-related text in the document.

**4. Residential use (residential_use)**
- Check the "용도" / "건물용도" entry of the building register.
- Detached house (단독주택), multi-unit housing (공동주택), apartment (아파트), row house (연립주택) or multi-household house (다세대주택): true.
- Retail (상가), office (사무소), neighbourhood facility (근린생활시설), factory (공장) or warehouse (창고): false.
- Evidence: the exact use text in the building register.

**5. Tax delinquency (tax_delinquency)**
- Check the delinquent amount (체납액) or unpaid tax (미납세액) of the tax payment certificate.
- Answer true when the delinquent amount is neither 0 nor "없음".
- Evidence: the concrete delinquent amount in the document.

**6. Owner name match between the register and the tax certificate (owner_verification)**
- The name (성명) or taxpayer name (납세자명) on the tax payment certificate.
- The owner (소유자) name on the real-estate register.
- Check whether the names on all documents match exactly.
- Evidence: the concrete names on each document.

**Guidelines:**
- When a document does not clearly state the information, answer in the affirmative.
- Do not guess; rely only on the text of the documents.
- Judge amounts, names and uses by exact text matching.

**Important**: take special care with item 6. If the owner name differs in even one place, answer false. For example, when every document but one shows the same owner name, the answer is false.

Answer only in the following JSON format:

{
  "excessive_loan": true or false,
  "rights_restriction": true or false,
  "trust_property": true or false,
  "residential_use": true or false,
  "tax_delinquency": true or false,
  "owner_verification": true or false
}
`;

export function assembleRequest(assetRefs: readonly AssetReference[]): InferenceRequest {
  return Object.freeze({
    instructionText: ANALYSIS_INSTRUCTIONS,
    assetRefs: Object.freeze(assetRefs.map((ref) => Object.freeze({ handle: ref.handle }))),
  });
}
