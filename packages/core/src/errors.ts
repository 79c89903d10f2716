export type PipelineErrorKind =
  | "download"
  | "upload"
  | "processing_failed"
  | "processing_timeout"
  | "model"
  | "parse"
  | "config";

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.kind = kind;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
