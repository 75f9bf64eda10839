import axios from "axios";

const SENSITIVE_KEYS = [
  "access_token",
  "accessToken",
  "refresh_token",
  "appIdHash",
  "pin",
  "Authorization",
  "Cookie",
  "secret",
];

/**
 * Replace credential values in free text. `secrets` are literal values
 * (the access token, the client id) removed wherever they appear.
 */
export function redactSensitiveValues(
  value: string,
  secrets: readonly string[] = [],
): string {
  let redacted = value;
  for (const secret of secrets) {
    if (secret.length < 4) continue;
    redacted = redacted.split(secret).join("<redacted>");
  }
  for (const key of SENSITIVE_KEYS) {
    const jsonRegex = new RegExp(`("${key}"\\s*:\\s*)"[^"]*"`, "gi");
    redacted = redacted.replace(jsonRegex, '$1"<redacted>"');
    const keyRegex = new RegExp(
      `(?<!")\\b(${key})\\s*[:=]\\s*(["']?)[^\\s"',;]+\\2`,
      "gi",
    );
    redacted = redacted.replace(keyRegex, "$1=<redacted>");
  }
  return redacted;
}

/**
 * Compact structured representation of an Axios error
 * Only includes essential debugging info without giant config dumps
 */
export interface CompactAxiosError {
  status?: number;
  statusText?: string;
  method?: string;
  url?: string;
  errorMessage?: string;
  errorCode?: string;
  /** Broker status code from the response body (`code`) */
  brokerCode?: number;
}

function messageFromBody(body: unknown): string | undefined {
  if (typeof body === "string") return body;
  if (typeof body !== "object" || body === null) return undefined;
  const message = "message" in body ? body.message : undefined;
  if (typeof message === "string" && message) return message;
  const error = "error" in body ? body.error : undefined;
  return typeof error === "string" && error ? error : undefined;
}

function codeFromBody(body: unknown): number | undefined {
  if (typeof body !== "object" || body === null || !("code" in body)) {
    return undefined;
  }
  return typeof body.code === "number" ? body.code : undefined;
}

/**
 * Extract a compact error summary from an Axios error
 * Avoids leaking sensitive data and giant config objects
 */
export function extractCompactAxiosError(
  error: unknown,
  secrets: readonly string[] = [],
): CompactAxiosError {
  if (!axios.isAxiosError(error)) {
    return {
      errorMessage: redactSensitiveValues(
        error instanceof Error ? error.message : String(error),
        secrets,
      ),
    };
  }

  const compact: CompactAxiosError = {};

  if (error.response?.status) {
    compact.status = error.response.status;
  }
  if (error.response?.statusText) {
    compact.statusText = error.response.statusText;
  }
  if (error.config?.method) {
    compact.method = error.config.method.toUpperCase();
  }
  if (error.config?.url) {
    // Path only; query strings may carry symbols or tokens
    compact.url = error.config.url.split("?")[0];
  }
  if (error.code) {
    compact.errorCode = error.code;
  }

  const responseData: unknown = error.response?.data;
  const brokerCode = codeFromBody(responseData);
  if (brokerCode !== undefined) {
    compact.brokerCode = brokerCode;
  }
  const bodyMessage = messageFromBody(responseData);
  if (bodyMessage) {
    compact.errorMessage = redactSensitiveValues(bodyMessage.slice(0, 200), secrets);
  }

  if (!compact.errorMessage && error.message) {
    compact.errorMessage = redactSensitiveValues(error.message.slice(0, 200), secrets);
  }

  return compact;
}

/**
 * Format a compact error for logging
 */
export function formatCompactError(compact: CompactAxiosError): string {
  const parts: string[] = [];

  if (compact.status) {
    parts.push(`status=${compact.status}`);
  }
  if (compact.statusText) {
    parts.push(`statusText="${compact.statusText}"`);
  }
  if (compact.method) {
    parts.push(`method=${compact.method}`);
  }
  if (compact.url) {
    parts.push(`url=${compact.url}`);
  }
  if (compact.errorCode) {
    parts.push(`code=${compact.errorCode}`);
  }
  if (compact.brokerCode !== undefined) {
    parts.push(`brokerCode=${compact.brokerCode}`);
  }
  if (compact.errorMessage) {
    parts.push(`error="${compact.errorMessage}"`);
  }

  return parts.join(" ");
}

export function sanitizeAxiosError(
  error: unknown,
  secrets: readonly string[] = [],
): Error {
  if (axios.isAxiosError(error)) {
    return new Error(formatCompactError(extractCompactAxiosError(error, secrets)));
  }

  if (error instanceof Error) {
    return new Error(redactSensitiveValues(error.message, secrets));
  }

  return new Error(redactSensitiveValues(String(error), secrets));
}
