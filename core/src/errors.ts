/**
 * Operation-level results (CORE)
 *
 * Per-record problems never leave the normalizer. Only dataset-level conditions
 * are reported to callers, as ok/error unions instead of thrown exceptions.
 */
export type PipelineErrorCode =
	| 'SOURCE_MISSING'
	| 'DATASET_EMPTY'
	| 'NO_SUBJECT_MATCH'
	| 'WRITE_FAILED'
	| 'FETCH_FAILED';

export type PipelineError = {
	code: PipelineErrorCode;
	message: string;
	details?: Record<string, unknown>;
};

export type PipelineOk<T> = { ok: true } & T;

export type PipelineFail = {
	ok: false;
	error: PipelineError;
};

export type PipelineResult<T> = PipelineOk<T> | PipelineFail;

export function pipelineFail(
	code: PipelineErrorCode,
	message: string,
	details?: Record<string, unknown>,
): PipelineFail {
	return { ok: false, error: { code, message, details } };
}

/** Best-effort message extraction for caught values. */
export function errorMessage(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}
