export type PipelineErrorKind = 'precondition' | 'collaborator' | 'malformed_output' | 'busy' | 'cancelled';

export type ErrorStatus = {
  status: 'error';
  kind: PipelineErrorKind;
  message: string;
  nextStep: string;
};

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly nextStep: string;

  constructor(kind: PipelineErrorKind, message: string, nextStep: string) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.nextStep = nextStep;
  }
}

/** An upstream field group or session input is missing; route back to the stage that owns it. */
export class PreconditionError extends PipelineError {
  constructor(message: string, nextStep: string) {
    super('precondition', message, nextStep);
    this.name = 'PreconditionError';
  }
}

export class CollaboratorError extends PipelineError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super('collaborator', message, 'Retry the stage; if it keeps failing, check the external service.');
    this.name = 'CollaboratorError';
    this.status = status;
  }
}

export class MalformedOutputError extends PipelineError {
  constructor(message: string) {
    super('malformed_output', message, 'Regenerate the stage output.');
    this.name = 'MalformedOutputError';
  }
}

export class StageBusyError extends PipelineError {
  constructor(activeStage: string) {
    super('busy', `Stage "${activeStage}" is still running on this session`, 'Wait for the running stage to finish.');
    this.name = 'StageBusyError';
  }
}

export class StageCancelledError extends PipelineError {
  constructor(stage: string) {
    super('cancelled', `Stage "${stage}" was cancelled before its updates were applied`, 'Run the stage again.');
    this.name = 'StageCancelledError';
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function toErrorStatus(error: unknown): ErrorStatus {
  if (isPipelineError(error)) {
    return { status: 'error', kind: error.kind, message: error.message, nextStep: error.nextStep };
  }
  const message = error instanceof Error ? error.message : String(error ?? 'unknown error');
  return {
    status: 'error',
    kind: 'collaborator',
    message,
    nextStep: 'Retry the stage; if it keeps failing, check the external service.'
  };
}
