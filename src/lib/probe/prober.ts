import type { ProbeOutcome } from "@/types";
import { errorMessage } from "@/lib/errors";

/** Reachability check for a single endpoint. Implementations must not retry. */
export interface Prober {
  probe(endpoint: string, timeoutMs: number): Promise<ProbeOutcome>;
}

const NETWORK_ERROR_CODES = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "CERT_HAS_EXPIRED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

/**
 * HEAD request against the endpoint, following redirects. Only a final
 * status of 200 counts as reachable.
 */
export class HttpProber implements Prober {
  private readonly fetchImpl: typeof fetch;

  constructor(options?: { fetchImpl?: typeof fetch }) {
    this.fetchImpl = options?.fetchImpl ?? fetch;
  }

  async probe(endpoint: string, timeoutMs: number): Promise<ProbeOutcome> {
    try {
      const response = await this.fetchImpl(endpoint, {
        method: "HEAD",
        redirect: "follow",
        signal: AbortSignal.timeout(timeoutMs),
      });
      // HEAD has no body, but undici holds the socket until it is released
      await response.body?.cancel();

      if (response.status === 200) {
        return { kind: "reachable" };
      }
      return { kind: "unreachable", reason: "httpStatus", status: response.status };
    } catch (err) {
      return classifyProbeError(err);
    }
  }
}

/**
 * Map a thrown fetch error onto a probe outcome. Timeouts and connection
 * failures are confirmed-unreachable; anything unrecognised is transient.
 */
export function classifyProbeError(err: unknown): ProbeOutcome {
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
    return { kind: "unreachable", reason: "timeout" };
  }

  const code = networkErrorCode(err);
  if (code) {
    if (code === "UND_ERR_CONNECT_TIMEOUT") {
      return { kind: "unreachable", reason: "timeout" };
    }
    return { kind: "unreachable", reason: "networkError", detail: code };
  }

  return { kind: "transient", detail: errorMessage(err) };
}

function networkErrorCode(err: unknown): string | null {
  // undici reports connection failures as TypeError("fetch failed") with the
  // socket error as `cause`
  if (!(err instanceof Error)) return null;
  const candidates: unknown[] = [err, err.cause];
  for (const candidate of candidates) {
    if (typeof candidate === "object" && candidate !== null && "code" in candidate) {
      const { code } = candidate;
      if (typeof code === "string" && NETWORK_ERROR_CODES.has(code)) {
        return code;
      }
    }
  }
  return null;
}

export function isReachable(outcome: ProbeOutcome): boolean {
  return outcome.kind === "reachable";
}

export function describeOutcome(outcome: ProbeOutcome): string {
  switch (outcome.kind) {
    case "reachable":
      return "reachable";
    case "transient":
      return `indeterminate (${outcome.detail})`;
    case "unreachable":
      switch (outcome.reason) {
        case "httpStatus":
          return `HTTP ${outcome.status}`;
        case "timeout":
          return "timed out";
        case "networkError":
          return `network error (${outcome.detail})`;
      }
  }
}
