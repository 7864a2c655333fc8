/**
 * Resolution errors and the result type every resolver returns.
 *
 * Nothing in the resolver throws for a known failure; each step hands back a
 * `Resolution<T>` and the orchestrator stops at the first `ok: false`.
 */

export type CompatibilityErrorKind =
  | 'NotebookVersionMismatch'
  | 'RecipeFrameworkVersionMismatch'
  | 'EngineVersionMismatch';

export type DispatchErrorKind =
  | 'UnsupportedTarget'
  | 'UnsupportedClusterType'
  | 'UnsupportedFlowStorage'
  | 'UnsupportedRecipeType';

export type LookupErrorKind =
  | 'UnknownBakery'
  | 'UnknownTarget'
  | 'MissingSecret'
  | 'UnknownRecipeReference';

export type ExternalErrorKind = 'RegistrationFailed';

export type ResolutionErrorKind =
  | CompatibilityErrorKind
  | DispatchErrorKind
  | LookupErrorKind
  | ExternalErrorKind;

export type ErrorCategory = 'compatibility' | 'dispatch' | 'lookup' | 'external';

const CATEGORY: Record<ResolutionErrorKind, ErrorCategory> = {
  NotebookVersionMismatch: 'compatibility',
  RecipeFrameworkVersionMismatch: 'compatibility',
  EngineVersionMismatch: 'compatibility',
  UnsupportedTarget: 'dispatch',
  UnsupportedClusterType: 'dispatch',
  UnsupportedFlowStorage: 'dispatch',
  UnsupportedRecipeType: 'dispatch',
  UnknownBakery: 'lookup',
  UnknownTarget: 'lookup',
  MissingSecret: 'lookup',
  UnknownRecipeReference: 'lookup',
  RegistrationFailed: 'external',
};

export class ResolutionError extends Error {
  readonly kind: ResolutionErrorKind;
  readonly category: ErrorCategory;
  readonly details: Record<string, unknown>;

  constructor(kind: ResolutionErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(`${kind}: ${message}`);
    this.name = 'ResolutionError';
    this.kind = kind;
    this.category = CATEGORY[kind];
    this.details = details;
  }
}

export type Resolution<T> =
  | { ok: true; value: T }
  | { ok: false; error: ResolutionError };

export function resolved<T>(value: T): Resolution<T> {
  return { ok: true, value };
}

export function failed<T = never>(
  kind: ResolutionErrorKind,
  message: string,
  details?: Record<string, unknown>
): Resolution<T> {
  return { ok: false, error: new ResolutionError(kind, message, details) };
}
