const API_KEY_PATTERNS: RegExp[] = [
  /sk-ant-[A-Za-z0-9_-]{10,}/g,
  /sk-[A-Za-z0-9_-]{10,}/g,
  /xai-[A-Za-z0-9_-]{10,}/g,
  /pplx-[A-Za-z0-9_-]{10,}/g,
  /AIza[A-Za-z0-9_-]{20,}/g,
];
const BEARER_PATTERN = /Bearer\s+[A-Za-z0-9._~+/=-]{20,}/g;
const JWT_PATTERN = /eyJ[A-Za-z0-9_-]+\.eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;

/** Redact credentials that providers echo back in error messages. */
export function sanitizeErrorMessage(message: string): string {
  let sanitized = message.replace(BEARER_PATTERN, "Bearer [REDACTED_TOKEN]");
  sanitized = sanitized.replace(JWT_PATTERN, "[REDACTED_JWT]");
  for (const pattern of API_KEY_PATTERNS) {
    sanitized = sanitized.replace(pattern, "[REDACTED_API_KEY]");
  }
  return sanitized;
}
