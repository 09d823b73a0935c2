// src/store/session.store.ts

import type { UploadSession, UploadSource } from "../types/upload.js";

export type SessionPatch = Partial<
  Pick<
    UploadSession,
    | "status"
    | "progress"
    | "fileSize"
    | "resultUrl"
    | "error"
    | "errorType"
    | "retryCount"
    | "workerPid"
  >
>;

export interface UpdateResult {
  // false when the record was already terminal and nothing was written
  applied: boolean;
  session: UploadSession;
}

export interface SessionStore {
  create(
    source: UploadSource,
    options?: { fileSize?: number | null }
  ): Promise<UploadSession>;

  read(sessionId: string): Promise<UploadSession>;

  /**
   * Read-modify-write under the record's lock. Terminal records are
   * never rewritten: the mutator is skipped and `applied` is false.
   */
  update(
    sessionId: string,
    mutator: (current: UploadSession) => SessionPatch
  ): Promise<UpdateResult>;

  list(filter?: { activeOnly?: boolean }): Promise<UploadSession[]>;

  delete(sessionId: string): Promise<void>;

  purgeOlderThan(maxAgeMs: number): Promise<number>;
}
