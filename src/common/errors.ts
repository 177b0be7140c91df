export type PipelineErrorKind = "io" | "parse" | "config" | "unexpected";

export interface PipelineErrorOptions {
  path?: string;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly path?: string;

  constructor(kind: PipelineErrorKind, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PipelineError";
    this.kind = kind;
    this.path = options.path;
  }
}

export function ioError(action: string, path: string, cause: unknown): PipelineError {
  const code = errorCode(cause);
  const suffix = code ? ` (${code})` : "";
  return new PipelineError("io", `Failed to ${action} ${path}${suffix}`, { path, cause });
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

/**
 * Stack of the error followed by every `cause` it wraps, one "Caused by:"
 * block per level.
 */
export function describeErrorTrace(value: unknown): string {
  const parts: string[] = [];
  let current: unknown = value;
  for (let depth = 0; current !== undefined && depth < 8; depth += 1) {
    const text = current instanceof Error ? current.stack ?? current.message : String(current);
    parts.push(depth === 0 ? text : `Caused by: ${text}`);
    current = current instanceof Error ? current.cause : undefined;
  }
  return parts.join("\n");
}

function errorCode(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("code" in value)) {
    return undefined;
  }
  const code = value.code;
  return typeof code === "string" ? code : undefined;
}
