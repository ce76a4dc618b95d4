/**
 * Shared analysis logging helper
 * Consistent request/response/error logging for the vision + OCR providers.
 * Never pass API keys or base64 image bodies in here.
 */

export type AnalysisEventType =
  | "ANALYSIS_START"
  | "ANALYSIS_COMPLETE"
  | "ANALYSIS_ERROR"
  | "PROVIDER_REQUEST"
  | "PROVIDER_RESPONSE"
  | "PROVIDER_ERROR";

export type AnalysisProvider = "openai" | "google_vision" | "local";

export interface AnalysisLogParams {
  event_type: AnalysisEventType;
  operation: string;
  provider?: AnalysisProvider;
  image_count?: number;
  http_status?: number;
  duration_ms?: number;
  request_id?: string | null;
  error_code?: string;
  error?: string;
  detail?: Record<string, unknown>;
}

export function logAnalysisEvent(params: AnalysisLogParams): void {
  const {
    event_type,
    operation,
    provider,
    image_count,
    http_status,
    duration_ms,
    request_id,
    error_code,
    error,
    detail,
  } = params;

  const logData: Record<string, unknown> = {
    event_type,
    operation,
    timestamp: new Date().toISOString(),
  };

  if (provider) logData.provider = provider;
  if (image_count !== undefined) logData.image_count = image_count;
  if (http_status !== undefined) logData.http_status = http_status;
  if (duration_ms !== undefined) logData.duration_ms = duration_ms;
  if (request_id) logData.request_id = request_id;
  if (error_code) logData.error_code = error_code;
  if (error) logData.error = error;
  if (detail) Object.assign(logData, detail);

  if (event_type === "ANALYSIS_ERROR" || event_type === "PROVIDER_ERROR") {
    console.error("ANALYSIS_EVENT", logData);
  } else if (event_type === "PROVIDER_RESPONSE" && http_status && http_status >= 400) {
    console.warn("ANALYSIS_EVENT", logData);
  } else {
    console.log("ANALYSIS_EVENT", logData);
  }
}

/**
 * Pull the provider request id for correlation (OpenAI uses x-request-id).
 */
export function extractRequestId(headers: Headers): string | null {
  return headers.get("x-request-id") || headers.get("x-goog-request-id") || null;
}
