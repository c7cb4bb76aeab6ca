import type { Cue, SectionLabels } from '../types/index.js';

/**
 * Base class for failures that end a run. Each subclass carries the input that
 * caused it so the CLI can show it back to the user.
 */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FormatError extends PipelineError {
  constructor(
    message: string,
    readonly line: string,
    readonly lineNumber: number
  ) {
    super(`${message} (line ${lineNumber}: "${line}")`);
  }
}

export class NoCaptionsError extends PipelineError {
  constructor(readonly videoId: string, reason?: string, options?: { cause?: unknown }) {
    super(`No captions available for video ${videoId}${reason ? `: ${reason}` : ''}`, options);
  }
}

export class SchemaError extends PipelineError {
  constructor(
    message: string,
    readonly rawResponse: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class BoundaryNotFoundError extends PipelineError {
  constructor(
    message: string,
    readonly labels: SectionLabels,
    readonly cues: readonly Cue[]
  ) {
    super(message);
  }
}
