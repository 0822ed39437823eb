/**
 * CheckpointStore interface: durable, atomic read/modify/write of the
 * checkpoint document.
 */

import type { Checkpoint, ProjectIdentity } from './checkpoint-schema.js'

export interface InitializeOptions {
  sessionId: string
  sessionBudget: number
  maxVerificationAttempts: number
}

/** A mutation receives a private copy of the document and returns the next one */
export type CheckpointMutation = (checkpoint: Checkpoint) => Checkpoint

export interface CheckpointStore {
  /** Path of the checkpoint document */
  readonly path: string

  /**
   * Read the current checkpoint.
   * @returns null when no checkpoint exists
   * @throws {CorruptStateError} if the document cannot be parsed or validated
   */
  load(): Promise<Checkpoint | null>

  /** Like `load`, but a missing checkpoint is an error */
  requireCheckpoint(): Promise<Checkpoint>

  /**
   * Create the checkpoint for a new project run.
   * @throws {CheckpointExistsError} if one already exists
   */
  initialize(identity: ProjectIdentity, options: InitializeOptions): Promise<Checkpoint>

  /**
   * Read-modify-write the whole document as one atomic unit.
   * Mutations should be idempotent when replayed.
   */
  mutate(fn: CheckpointMutation): Promise<Checkpoint>

  /** Remove the checkpoint and its backup. Explicit user action only. */
  delete(): Promise<void>

  /** Acquire the single-process lock for the session */
  lock(sessionId: string): Promise<void>

  /** Release the lock if held by this process */
  unlock(): Promise<void>
}
