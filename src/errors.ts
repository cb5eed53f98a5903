export type ErrorKind =
  | 'InvalidRequest'
  | 'AlreadyExists'
  | 'InstanceNotFound'
  | 'CommitNotFound'
  | 'ResourceExhausted'
  | 'StartupTimeout'
  | 'AgentSpawnFailed'
  | 'ContractUnavailable'
  | 'RequestRejected'
  | 'UpstreamUnavailable'
  | 'RateLimited';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InvalidRequest: 400,
  RequestRejected: 403,
  InstanceNotFound: 404,
  AlreadyExists: 409,
  CommitNotFound: 422,
  RateLimited: 429,
  AgentSpawnFailed: 500,
  UpstreamUnavailable: 502,
  ResourceExhausted: 503,
  ContractUnavailable: 503,
  StartupTimeout: 504,
};

export class OrchestratorError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OrchestratorError';
    this.kind = kind;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

export function isOrchestratorError(error: unknown, kind?: ErrorKind): error is OrchestratorError {
  return error instanceof OrchestratorError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
