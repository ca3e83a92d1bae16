export type CodingErrorCode =
  | "index_out_of_range"
  | "invalid_group_label"
  | "invalid_context_label"
  | "metadata_unavailable"
  | "metadata_missing_filename_column"
  | "metadata_empty"
  | "progress_unreadable"
  | "progress_write_failed"
  | "image_not_found"
  | "image_source_failed"
  | "export_not_ready";

const STATUS_BY_CODE: Record<CodingErrorCode, number> = {
  index_out_of_range: 400,
  invalid_group_label: 400,
  invalid_context_label: 400,
  metadata_unavailable: 500,
  metadata_missing_filename_column: 500,
  metadata_empty: 500,
  progress_unreadable: 500,
  progress_write_failed: 500,
  image_not_found: 404,
  image_source_failed: 502,
  export_not_ready: 409
};

export class CodingError extends Error {
  readonly code: CodingErrorCode;
  readonly statusCode: number;

  constructor(code: CodingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CodingError";
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }
}

export function isCodingError(error: unknown): error is CodingError {
  return error instanceof CodingError;
}
