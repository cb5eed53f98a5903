import { z } from 'zod/v4';

export type InstanceStatus = 'provisioning' | 'running' | 'draining' | 'terminated';

// Also a valid git branch suffix: no `..`, no trailing `.`, no `.lock` ending
export const CORRELATION_ID_PATTERN = /^(?!.*\.\.)(?!.*\.lock$)[A-Za-z0-9][A-Za-z0-9._-]{0,127}(?<!\.)$/;
export const COMMIT_PATTERN = /^[0-9a-fA-F]{7,40}$/;

export const correlationIdSchema = z
  .string()
  .regex(
    CORRELATION_ID_PATTERN,
    'correlation_id must be 1-128 characters of [A-Za-z0-9._-] starting with a letter or digit, ' +
      'without "..", a trailing "." or a ".lock" ending'
  );

export const commitSchema = z.string().regex(COMMIT_PATTERN, 'source_commit must be a 7-40 character hex commit id');

export interface ContractOperation {
  method: string;
  template: string;
  pattern: RegExp;
}

export interface ApiContract {
  title?: string;
  version?: string;
  operations: ContractOperation[];
  fetchedAt: Date;
}

export interface Instance {
  correlationId: string;
  sourceCommit: string;
  referenceCommit: string;
  workingCopyPath: string;
  branchName: string;
  port: number;
  pid?: number;
  status: InstanceStatus;
  createdAt: Date;
  logPath?: string;
  pidFile?: string;
  incident?: Incident;
  apiContract?: ApiContract;
}

// Context about the failure being debugged, written into the working copy for the agent.
export const incidentSchema = z.object({
  error: z.string().optional(),
  traceback: z
    .object({
      file: z.string(),
      line: z.number().int(),
      function: z.string(),
      stack_trace: z.string(),
    })
    .optional(),
  request_url: z.string().optional(),
  request_method: z.string().optional(),
  host: z.string().optional(),
  type: z.string().optional(),
  occurred_at: z.string().optional(),
});

export type Incident = z.infer<typeof incidentSchema>;

export const setupRequestSchema = z.object({
  correlation_id: correlationIdSchema,
  source_commit: commitSchema.optional(),
  incident: incidentSchema.optional(),
});

export const chatTranscriptSchema = z.record(z.string(), z.unknown());

export type ChatTranscript = z.infer<typeof chatTranscriptSchema>;

export interface ChatRecord {
  id: number;
  correlationId: string;
  transcript: ChatTranscript;
  savedAt: Date;
}

export interface SetupOptions {
  correlationId: string;
  sourceCommit?: string;
  incident?: Incident;
}

export interface InstanceDescriptor {
  correlation_id: string;
  status: InstanceStatus;
  port: number;
  working_copy_path: string;
  branch_name: string;
  source_commit: string;
  reference_commit: string;
  pid: number | null;
  created_at: string;
  contract_operations: number | null;
}

export interface SetupResponse extends InstanceDescriptor {
  compare_advice: string;
  matches_reference: boolean;
  reused: boolean;
}

export interface PortCheckResult {
  port: number;
  reachable: boolean;
  healthy: boolean;
  version?: string;
  error?: string;
}

export interface SupervisedProcess {
  pid: number;
  port: number;
  correlationId: string;
  logPath: string;
  pidFile: string;
  startedAt: Date;
  adopted: boolean;
}

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ReapStats {
  removedWorktrees: number;
  prunedBranches: number;
  reapedInstances: string[];
}

export function toDescriptor(instance: Instance): InstanceDescriptor {
  return {
    correlation_id: instance.correlationId,
    status: instance.status,
    port: instance.port,
    working_copy_path: instance.workingCopyPath,
    branch_name: instance.branchName,
    source_commit: instance.sourceCommit,
    reference_commit: instance.referenceCommit,
    pid: instance.pid ?? null,
    created_at: instance.createdAt.toISOString(),
    contract_operations: instance.apiContract ? instance.apiContract.operations.length : null,
  };
}

export function branchNameFor(correlationId: string): string {
  return `debug/${correlationId}`;
}
