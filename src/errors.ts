import type { Axis, Position } from "./util.js";

export class MalformedTemplateError extends Error {
  readonly reason: string;
  readonly position?: Position;

  constructor(reason: string, position?: Position) {
    super(position ? `${reason} at row ${position.row}, column ${position.col}` : reason);
    this.name = "MalformedTemplate";
    this.reason = reason;
    this.position = position;
  }
}

export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenerationError";
  }
}

export class TooSmallError extends GenerationError {
  readonly axis: Axis;
  readonly minimum: number;
  readonly requested: number;

  constructor(axis: Axis, minimum: number, requested: number) {
    super(`requested ${axis} ${requested} is below the minimum ${minimum}`);
    this.name = "TooSmall";
    this.axis = axis;
    this.minimum = minimum;
    this.requested = requested;
  }
}

/** Internal consistency failure: a segment collapsed during re-layout. Never caused by input. */
export class DegenerateSegmentError extends GenerationError {
  readonly segment: number;

  constructor(segment: number, length: number) {
    super(`segment ${segment} resolved to length ${length}`);
    this.name = "DegenerateSegment";
    this.segment = segment;
  }
}

export type PipelineError = MalformedTemplateError | GenerationError;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function isPipelineError(e: unknown): e is PipelineError {
  return e instanceof MalformedTemplateError || e instanceof GenerationError;
}

/** Runs `fn`, turning pipeline errors into values. Anything else is rethrown. */
export function attempt<T>(fn: () => T): Result<T, PipelineError> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (isPipelineError(e)) return { ok: false, error: e };
    throw e;
  }
}
