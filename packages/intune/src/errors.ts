// packages/intune/src/errors.ts
import { z } from "zod";

// ──────────────────────────────────────────────────────────────────────────────
// Error normalization (Graph / identity)
// ──────────────────────────────────────────────────────────────────────────────
export type GraphErrorType = "CredentialError" | "AuthorizationError" | "HttpError" | "GraphError";

export interface NormalizedGraphError {
  status: "error";
  error: {
    type: GraphErrorType;
    code?: string;
    message: string;
    statusCode?: number;
    requestId?: string;
    throttled: boolean;
    retryable: boolean;
    retryAfterMs?: number;
  };
}

// GraphError from @microsoft/microsoft-graph-client and the @azure/identity errors share these fields.
const ErrorShape = z
  .object({
    name: z.string().optional(),
    message: z.string().optional(),
    code: z.string().nullish(),
    statusCode: z.number().optional(),
    requestId: z.string().nullish(),
    headers: z.unknown().optional(),
  })
  .passthrough();

const CREDENTIAL_ERRORS = new Set(["CredentialUnavailableError", "AuthenticationError", "AggregateAuthenticationError"]);

function parseRetryAfter(headers: unknown): number | undefined {
  let raw: unknown;
  if (headers instanceof Headers) raw = headers.get("retry-after");
  else if (headers && typeof headers === "object") {
    const rec = z.record(z.unknown()).safeParse(headers);
    if (rec.success) raw = rec.data["retry-after"] ?? rec.data["Retry-After"];
  }
  if (typeof raw !== "string" && typeof raw !== "number") return undefined;
  const asInt = parseInt(String(raw), 10);
  return Number.isFinite(asInt) ? asInt * 1000 : undefined;
}

export function normalizeGraphError(e: unknown): NormalizedGraphError {
  const parsed = ErrorShape.safeParse(e);
  const shape: z.infer<typeof ErrorShape> = parsed.success ? parsed.data : {};
  const message = shape.message || (e instanceof Error ? e.message : String(e)) || "Unknown Graph error";

  if (shape.name && CREDENTIAL_ERRORS.has(shape.name)) {
    return { status: "error", error: { type: "CredentialError", message, throttled: false, retryable: false } };
  }

  const status = shape.statusCode;
  const code = shape.code ?? undefined;
  const throttled = status === 429 || /thrott/i.test(code ?? "");
  const retryable = throttled || status === 408 || (typeof status === "number" && status >= 500);
  const type: GraphErrorType =
    status === 401 || status === 403 ? "AuthorizationError" : typeof status === "number" ? "HttpError" : "GraphError";

  return {
    status: "error",
    error: {
      type,
      code,
      message,
      statusCode: status,
      requestId: shape.requestId ?? undefined,
      throttled,
      retryable,
      retryAfterMs: parseRetryAfter(shape.headers),
    },
  };
}

export function isAuthFailure(n: NormalizedGraphError): boolean {
  return n.error.type === "CredentialError" || n.error.type === "AuthorizationError";
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

// ──────────────────────────────────────────────────────────────────────────────
// Error taxonomy
// ──────────────────────────────────────────────────────────────────────────────
export type SourceFailureKind = "auth" | "transport";

/** Raised by a DeviceSource when the fleet cannot be listed. */
export class DeviceSourceError extends Error {
  constructor(
    public readonly kind: SourceFailureKind,
    public readonly detail: NormalizedGraphError["error"],
    options?: { cause?: unknown }
  ) {
    super(detail.message, options);
    this.name = "DeviceSourceError";
  }
}

export type FleetFailureReason = SourceFailureKind | "empty";

/** The run cannot proceed: nothing is exported. */
export class FleetError extends Error {
  constructor(public readonly reason: FleetFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FleetError";
  }
}

/** The report was built but the file could not be written. */
export class ExportError<TReport = unknown> extends Error {
  public report?: TReport;

  constructor(public readonly path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExportError";
  }
}
