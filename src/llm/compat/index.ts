export {
  classifyHttpStatus,
  DEFAULT_RETRY_AFTER_SECONDS,
  describeLlmFailure,
  getFailureDisposition,
  parseRetryAfterSeconds,
  type FailureDisposition,
  type LlmFailure,
  type LlmFailureKind,
} from "./classify-error";
export {
  llmResponseSchema,
  normalizeMessagesForTransport,
  normalizeResponseContent,
  type MessageNormalizationReason,
  type MessageNormalizationResult,
  type RawLlmResponse,
} from "./normalize-messages";
