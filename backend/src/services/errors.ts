// ═══════════════════════════════════════════════════════
// errors.ts — Load pipeline error taxonomy
// Every class carries a stable code and the HTTP status the API answers with.
// ═══════════════════════════════════════════════════════

export class PipelineError extends Error {
  code: string;
  status: number;
  constructor(message: string, code: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
    this.status = status;
  }
}

/** Point text that does not match POINT(x y). */
export class MalformedGeometryError extends PipelineError {
  readonly input: string | null;
  constructor(input: string | null | undefined, reason: string) {
    super(`Malformed geometry ${JSON.stringify(input ?? null)}: ${reason}`, 'MALFORMED_GEOMETRY', 502);
    this.name = 'MalformedGeometryError';
    this.input = input ?? null;
  }
}

/** A recognized WKT geometry other than POINT. */
export class UnsupportedGeometryTypeError extends PipelineError {
  readonly geometryType: string;
  constructor(geometryType: string) {
    super(`Unsupported geometry type ${geometryType}; only POINT is supported`, 'UNSUPPORTED_GEOMETRY_TYPE', 502);
    this.name = 'UnsupportedGeometryTypeError';
    this.geometryType = geometryType;
  }
}

/** A row whose columns fail validation. */
export class MalformedRecordError extends PipelineError {
  readonly rowIndex: number;
  constructor(rowIndex: number, details: string[]) {
    super(`Malformed property row ${rowIndex}: ${details.join('; ')}`, 'MALFORMED_RECORD', 502);
    this.name = 'MalformedRecordError';
    this.rowIndex = rowIndex;
  }
}

/** Connection or query failure; the underlying error is kept as cause. */
export class DataSourceUnavailableError extends PipelineError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Data source unavailable: ${detail}`, 'DATA_SOURCE_UNAVAILABLE', 503, { cause });
    this.name = 'DataSourceUnavailableError';
  }
}
