// Shared Enums (packages/shared/src/enums.ts)

/**
 * Closed set of fault categories surfaced by the API.
 * Each kind is bound to exactly one HTTP status (see FAULT_STATUS).
 */
export enum FaultKind {
  INVALID_PAYLOAD = "InvalidPayload",
  NOT_FOUND = "NotFound",
  NETWORK = "Network",
  LLM_PROVIDER = "LLMProvider",
  TIMEOUT = "Timeout",
  GENERIC = "Generic"
}

export const FAULT_STATUS: Readonly<Record<FaultKind, number>> = {
  [FaultKind.INVALID_PAYLOAD]: 400,
  [FaultKind.NOT_FOUND]: 404,
  [FaultKind.NETWORK]: 503,
  [FaultKind.LLM_PROVIDER]: 502,
  [FaultKind.TIMEOUT]: 504,
  [FaultKind.GENERIC]: 500
};
