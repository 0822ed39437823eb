/**
 * Existence checks for artifacts the agent claims to have produced.
 * Content is never inspected.
 */

import { access } from 'fs/promises'
import { isAbsolute, join } from 'path'

export interface ArtifactInspector {
  /** Artifacts from `artifacts` that do not exist */
  missing(artifacts: readonly string[]): Promise<string[]>
}

export class FileArtifactInspector implements ArtifactInspector {
  constructor(private readonly _projectRoot: string) {}

  async missing(artifacts: readonly string[]): Promise<string[]> {
    const absent: string[] = []
    for (const artifact of artifacts) {
      const path = isAbsolute(artifact) ? artifact : join(this._projectRoot, artifact)
      try {
        await access(path)
      } catch {
        absent.push(artifact)
      }
    }
    return absent
  }
}

/** Treats every artifact as present; for agents whose artifacts live elsewhere */
export class TrustingArtifactInspector implements ArtifactInspector {
  async missing(): Promise<string[]> {
    return []
  }
}
