import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ArtifactBlob } from '../portal/types.js';

export interface StoredArtifact extends ArtifactBlob {
  workItemId: string;
  capturedAt: Date;
}

/** Persists diagnostic captures and returns a reference to each. */
export interface ArtifactSink {
  store(artifact: StoredArtifact): Promise<string>;
}

/** Writes `<root>/<workItemId>/<timestamp>-<kind>.<ext>`. */
export class FileArtifactSink implements ArtifactSink {
  constructor(private readonly rootDir: string) {}

  async store(artifact: StoredArtifact): Promise<string> {
    const dir = join(this.rootDir, artifact.workItemId);
    await mkdir(dir, { recursive: true });

    const stamp = artifact.capturedAt.toISOString().replace(/[:.]/g, '-');
    const path = join(dir, `${stamp}-${artifact.kind}.${artifact.extension}`);
    await writeFile(path, artifact.data);
    return path;
  }
}
