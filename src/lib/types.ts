export type ProviderKind = "aws" | "azure";

export type InstanceState = "running" | "stopped" | "pending" | "stopping" | "unknown";

export interface InstanceTarget {
  id: string;
  state: InstanceState;
  ip?: string;
}

export type ReadinessState = "unknown" | "polling" | "ready" | "timed_out";

export type CommandStatus = "pending" | "in_progress" | "success" | "failed" | "cancelled" | "timed_out";

export interface CommandResult {
  status: CommandStatus;
  rawStatus: string;
  stdout: string;
  stderr: string;
}

export type DispatchFailureReason = "remote_failure" | "backend_unavailable" | "timeout";

export type DispatchResult =
  | { ok: true; commandId: string; stdout: string }
  | {
      ok: false;
      reason: DispatchFailureReason;
      message: string;
      commandId?: string;
      stdout?: string;
      stderr?: string;
    };

export type InstanceOutcome =
  | { status: "applied" }
  | { status: "failed"; reason: DispatchFailureReason; message: string }
  | { status: "skipped"; message: string };

export interface BatchResult {
  credential?: string;
  generatedAt?: Date;
  perInstance: Map<string, InstanceOutcome>;
  recordPath?: string;
  /** Set when the record could not be written; the credential is then only in this result. */
  recordError?: string;
  descriptorPaths: string[];
}

export type DescriptorFormat = "dcv" | "rdp";

export type RecordedStatus = "applied" | "failed" | "not_attempted";

export interface CredentialRecordEntry {
  index: number;
  id: string;
  ip?: string;
  status: RecordedStatus;
}

export interface CredentialRecord {
  credential: string;
  generatedAt: Date;
  username: string;
  entries: CredentialRecordEntry[];
}
