export interface FieldError {
  path: string;
  message: string;
}

export type ErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "MISSING_COLUMNS"
  | "INVALID_ARGUMENT"
  | "ROW_FAILED"
  | "SEGMENTATION_FAILED"
  | "SERIALIZATION_FAILED"
  | "INTERNAL";

export class AnalysisError extends Error {
  readonly code: ErrorCode;
  readonly errors?: FieldError[];

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown; errors?: FieldError[] }) {
    super(message, { cause: options?.cause });
    this.name = "AnalysisError";
    this.code = code;
    this.errors = options?.errors;
  }
}

export interface Problem {
  type: string;
  title: string;
  code: ErrorCode;
  detail?: string;
  errors?: FieldError[];
}

export function problem(params: { code: ErrorCode; detail?: string; errors?: FieldError[] }): Problem {
  const type = `urn:lyrics-vocab:error:${params.code.toLowerCase().replace(/_/g, "-")}`;
  return {
    type,
    title: codeToTitle(params.code),
    code: params.code,
    detail: params.detail,
    errors: params.errors,
  };
}

/** Normalizes anything thrown into a problem record for logging. */
export function toProblem(e: unknown): Problem {
  if (e instanceof AnalysisError) {
    return problem({ code: e.code, detail: e.message, errors: e.errors });
  }
  return problem({ code: "INTERNAL", detail: e instanceof Error ? e.message : String(e) });
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

function codeToTitle(code: ErrorCode): string {
  switch (code) {
    case "SOURCE_UNAVAILABLE":
      return "Source unavailable";
    case "MISSING_COLUMNS":
      return "Missing columns";
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "ROW_FAILED":
      return "Row failed";
    case "SEGMENTATION_FAILED":
      return "Segmentation failed";
    case "SERIALIZATION_FAILED":
      return "Serialization failed";
    default:
      return "Internal error";
  }
}
