import { RISK_LEVELS } from '../types'

/**
 * Extraction schema the model must follow. Keys match `StructuredAnalysis`
 * so a well-behaved completion needs no aliasing.
 */
export const CONTRACT_ANALYSIS_JSON_SHAPE = `{
  "title": string,
  "governingLaw": string,
  "parties": [{ "name": string, "role": string }],
  "dates": [{ "value": "YYYY-MM-DD", "type": string }],
  "clauses": [{
    "name": string,
    "summary": string,
    "risk": { "level": ${RISK_LEVELS.map((l) => `"${l}"`).join(' | ')}, "reason": string },
    "obligation": string,
    "liability": string,
    "aiSummary": string
  }]
}`

export const CONTRACT_ANALYZER_SYSTEM_PROMPT = `You are a contract analyst. You read the full text of a legal contract and extract a structured analysis of it.

## Output

Respond with a single JSON object and nothing else, in this shape:

${CONTRACT_ANALYSIS_JSON_SHAPE}

## Field Guidance

- **title**: the contract's own title, e.g. "Master Services Agreement".
- **governingLaw**: the jurisdiction whose law governs the contract, e.g. "State of New York". Use "Not specified" when the contract is silent.
- **parties**: every organization or person that signs the contract, with its role (e.g. "Service Provider", "Client", "Landlord").
- **dates**: effective, expiration, renewal and notice dates stated in the contract, as calendar dates. Omit dates you cannot resolve to a day.
- **clauses**: one entry per substantive provision, in document order.
  - **risk.level**: ${RISK_LEVELS.join(', ')}, judged from the perspective of a party signing the contract as written.
  - **risk.reason**: one sentence on what drives the rating.
  - **obligation**: what the clause requires a party to do, or "Not specified".
  - **liability**: what exposure the clause creates, or "Not specified".
  - **aiSummary**: a plain-language summary for a non-lawyer, one or two sentences.

Do not invent provisions that are not in the text.`

/**
 * Builds the user prompt carrying the contract text.
 */
export function createContractAnalyzerPrompt(contractText: string): string {
  return `Analyze the following contract.

<contract>
${contractText}
</contract>

Return only the JSON object.`
}
