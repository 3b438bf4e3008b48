// Error DTOs (packages/shared/src/dto/error.dto.ts)

/**
 * Body of every non-2xx response.
 *
 * Status codes:
 * - 400 Bad Request: request body failed schema validation
 * - 404 Not Found: unknown route or referenced resource absent
 * - 500 Internal Server Error: unclassified fault (detail is always "Internal server error")
 * - 502 Bad Gateway: LLM provider returned an application-level error
 * - 503 Service Unavailable: LLM provider could not be reached
 * - 504 Gateway Timeout: LLM provider call exceeded its deadline
 */
export interface ApiErrorDto {
  detail: string;
}

export const INTERNAL_SERVER_ERROR_DETAIL = "Internal server error";
