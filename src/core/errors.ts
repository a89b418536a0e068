/**
 * Error taxonomy
 *
 * Only DetectionError is thrown: it aborts the run. Every other kind is
 * isolated to its invocation or collaborator and recorded as data
 * (ToolRun.errorKind, GuardianOutcome.collaboratorErrors).
 */

export type CollaboratorErrorKind = 'SummarizerUnavailable' | 'SinkError';

export interface CollaboratorError {
  kind: CollaboratorErrorKind;
  collaborator: string;
  message: string;
}

export class DetectionError extends Error {
  readonly root: string;

  constructor(root: string, reason: string) {
    super(`Cannot read repository at ${root}: ${reason}`);
    this.name = 'DetectionError';
    this.root = root;
  }
}

export function isDetectionError(error: unknown): error is DetectionError {
  return error instanceof DetectionError;
}
