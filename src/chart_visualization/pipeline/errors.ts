export type ChartPipelineErrorCode =
  | "REQUEST_INVALID"
  | "GENERATION_FAILED"
  | "SPEC_EMPTY"
  | "SPEC_INVALID"
  | "RENDER_FAILED"
  | "PERSISTENCE_FAILED"
  | "UPDATE_TARGET_MISSING"
  | "ANNOTATION_FAILED";

export type ChartFailure = {
  stage_failed: string;
  code: ChartPipelineErrorCode;
  reason: string;
  details: string[];
};

export class ChartPipelineError extends Error {
  readonly code: ChartPipelineErrorCode;
  readonly stage_name: string;
  readonly details: string[];

  constructor(params: {
    code: ChartPipelineErrorCode;
    stage_name: string;
    reason: string;
    details?: string[];
    cause?: unknown;
  }) {
    super(params.reason, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "ChartPipelineError";
    this.code = params.code;
    this.stage_name = params.stage_name;
    this.details = params.details ?? [];
  }

  toFailure(): ChartFailure {
    return {
      stage_failed: this.stage_name,
      code: this.code,
      reason: this.message,
      details: this.details,
    };
  }
}

function defaultCodeForStage(stageName: string): ChartPipelineErrorCode {
  if (stageName === "render") return "RENDER_FAILED";
  if (stageName === "generate_spec") return "GENERATION_FAILED";
  if (stageName === "request") return "REQUEST_INVALID";
  return "PERSISTENCE_FAILED";
}

export function toChartFailure(error: unknown, stageName: string): ChartFailure {
  if (error instanceof ChartPipelineError) {
    return error.toFailure();
  }

  const reason = error instanceof Error ? error.message : String(error);
  return {
    stage_failed: stageName,
    code: defaultCodeForStage(stageName),
    reason,
    details: [],
  };
}

export function describeFailure(failure: ChartFailure): string {
  return failure.details.length > 0 ? `${failure.reason} (${failure.details.join("; ")})` : failure.reason;
}
