import axios, { AxiosError, AxiosInstance } from "axios";

const USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64; rv:133.0) Gecko/20100101 Firefox/133.0";

/**
 * Create a configured axios instance with realistic browser headers.
 * The transport's default timeout applies.
 */
export function createHttpClient(): AxiosInstance {
  return axios.create({
    headers: {
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
      "User-Agent": USER_AGENT,
    },
    maxRedirects: 5,
  });
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED") return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ERR_TLS_CERT_ALTNAME_INVALID")
      return "SSL certificate error";
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a date as "YYYY-MM-DDTHH:MM:SSZ" (UTC, second precision).
 */
export function toIsoSeconds(date: Date): string {
  return date.toISOString().slice(0, 19) + "Z";
}

/**
 * Format a date as a filename-safe timestamp: "YYYY-MM-DDTHH-MM-SSZ".
 */
export function toFileTimestamp(date: Date): string {
  return toIsoSeconds(date).replace(/:/g, "-");
}
