/**
 * Orchestration error taxonomy.
 *
 * Every failure the turn pipeline reacts to is one of these classes; the
 * `kind` discriminant is what the audit trail and metrics record.
 */

import type { SecurityVerdict } from '../security/types';
import type { DependencyName } from './types';

export type OrchestrationErrorKind =
  | 'admission_rejected'
  | 'version_conflict'
  | 'collaborator_timeout'
  | 'collaborator_error'
  | 'classification_ambiguous'
  | 'escalation_required'
  | 'turn_cancelled';

/** Failure classes the retry policy is keyed by */
export type FailureClass = 'timeout' | 'error' | 'version_conflict';

export abstract class OrchestrationError extends Error {
  abstract readonly kind: OrchestrationErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class AdmissionRejected extends OrchestrationError {
  readonly kind = 'admission_rejected' as const;

  constructor(readonly verdict: Extract<SecurityVerdict, { allowed: false }>) {
    super(`Message rejected by security gate: ${verdict.reason}`);
  }
}

export class VersionConflict extends OrchestrationError {
  readonly kind = 'version_conflict' as const;

  constructor(
    readonly conversationKey: string,
    readonly expectedVersion: number,
    readonly actualVersion: number,
  ) {
    super(`Version conflict on ${conversationKey}: expected ${expectedVersion}, found ${actualVersion}`);
  }
}

export class CollaboratorTimeout extends OrchestrationError {
  readonly kind = 'collaborator_timeout' as const;

  constructor(
    readonly dependency: DependencyName,
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${dependency}.${operation} timed out after ${timeoutMs}ms`);
  }
}

export class CollaboratorError extends OrchestrationError {
  readonly kind = 'collaborator_error' as const;

  constructor(
    readonly dependency: DependencyName,
    readonly operation: string,
    readonly underlying?: unknown,
  ) {
    super(`${dependency}.${operation} failed: ${describeCause(underlying)}`);
  }
}

export class ClassificationAmbiguous extends OrchestrationError {
  readonly kind = 'classification_ambiguous' as const;

  constructor(
    readonly category: string,
    readonly confidence: number,
  ) {
    super(`Intent ${category} below switching confidence (${confidence})`);
  }
}

export class EscalationRequired extends OrchestrationError {
  readonly kind = 'escalation_required' as const;

  constructor(readonly triggers: readonly string[]) {
    super(`Escalation required: ${triggers.join(', ')}`);
  }
}

export class TurnCancelled extends OrchestrationError {
  readonly kind = 'turn_cancelled' as const;

  constructor(readonly stage: string) {
    super(`Turn cancelled before ${stage}`);
  }
}

export type CollaboratorFailure = CollaboratorTimeout | CollaboratorError;

export function isCollaboratorFailure(err: unknown): err is CollaboratorFailure {
  return err instanceof CollaboratorTimeout || err instanceof CollaboratorError;
}

export function failureClassOf(err: CollaboratorFailure): Exclude<FailureClass, 'version_conflict'> {
  return err instanceof CollaboratorTimeout ? 'timeout' : 'error';
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
