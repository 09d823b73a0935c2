// src/types/upload.ts

export type UploadStatus =
  | "starting"
  | "uploading"
  | "completed"
  | "failed"
  | "cancelled";

export type UploadSource =
  | { kind: "file"; path: string }
  | { kind: "url"; url: string };

export interface UploadSession {
  sessionId: string;
  source: UploadSource;
  status: UploadStatus;
  progress: number;
  fileSize: number | null;
  resultUrl: string | null;
  error: string | null;
  errorType: string | null;
  retryCount: number;
  createdAt: string;
  updatedAt: string;
  workerPid: number | null;
}

/**
 * What callers get back from a status poll. The worker pid only exists
 * so the orchestrator can signal the process.
 */
export type UploadSnapshot = Omit<UploadSession, "workerPid">;

export interface UploadSummary {
  sessionId: string;
  status: UploadStatus;
  progress: number;
  fileSize: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface StartUploadResult {
  sessionId: string;
  status: "starting";
  fileSize: number | null;
  estimatedDurationSeconds: number | null;
}

export interface UploadResult {
  sessionId: string;
  url: string;
  fileSize: number | null;
}

export type CancelOutcome = "cancelled" | "already_finished";

export const TERMINAL_STATUSES: ReadonlySet<UploadStatus> = new Set([
  "completed",
  "failed",
  "cancelled",
]);

export const ACTIVE_STATUSES: ReadonlySet<UploadStatus> = new Set([
  "starting",
  "uploading",
]);

// Allowed edges of the session state machine. Terminal states have none.
const TRANSITIONS: Record<UploadStatus, readonly UploadStatus[]> = {
  starting: ["starting", "uploading", "failed", "cancelled"],
  uploading: ["uploading", "completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(status: UploadStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function canTransition(from: UploadStatus, to: UploadStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function toSnapshot(session: UploadSession): UploadSnapshot {
  const { workerPid: _workerPid, ...snapshot } = session;
  return snapshot;
}

export function toSummary(session: UploadSession): UploadSummary {
  return {
    sessionId: session.sessionId,
    status: session.status,
    progress: session.progress,
    fileSize: session.fileSize,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
  };
}
