export type ErrorKind =
  | "service_unavailable"
  | "render_failure"
  | "detection_failure"
  | "rewrite_failure"
  | "generation_failure"
  | "deploy_failure"
  | "not_found"
  | "validation_failure";

export interface PipelineError {
  kind: ErrorKind;
  detail: string;
  cause?: unknown;
}

export type Result<T, E = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function pipelineError(
  kind: ErrorKind,
  detail: string,
  cause?: unknown
): PipelineError {
  return cause === undefined ? { kind, detail } : { kind, detail, cause };
}

/** Message of anything thrown */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Run `fn`, turning a throw into an error of the given kind */
export async function attempt<T>(
  kind: ErrorKind,
  fn: () => Promise<T>
): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (e) {
    return err(pipelineError(kind, errorMessage(e), e));
  }
}
