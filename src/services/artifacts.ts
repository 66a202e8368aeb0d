import fsp from 'fs/promises';
import { logger } from '../config/logger';
import { TransientArtifactCleanupError, errorMessage } from '../utils/errors';

type Remover = () => Promise<void>;

interface TrackedArtifact {
  description: string;
  remove: Remover;
}

function hasCode(err: unknown): err is { code: unknown } {
  return typeof err === 'object' && err !== null && 'code' in err;
}

/** True when the error only says the artifact no longer exists. */
export function isAbsentArtifactError(err: unknown): boolean {
  if (hasCode(err) && err.code === 'ENOENT') return true;
  return err instanceof Error && (err.name === 'NoSuchKey' || err.name === 'NotFound');
}

/**
 * Per-request registry of transient files and remote objects.
 *
 * Artifacts are registered before they are created, so cleanup also covers
 * partially created ones. cleanup() runs once, attempts every removal and
 * never throws.
 */
export class RequestArtifacts {
  private readonly artifacts: TrackedArtifact[] = [];
  private cleaned = false;

  constructor(readonly requestId: string) {}

  trackFile(filePath: string): string {
    this.artifacts.push({
      description: `file ${filePath}`,
      remove: () => fsp.unlink(filePath),
    });
    return filePath;
  }

  trackObject(description: string, remove: Remover): void {
    this.artifacts.push({ description: `object ${description}`, remove });
  }

  get count(): number {
    return this.artifacts.length;
  }

  async cleanup(): Promise<void> {
    if (this.cleaned) return;
    this.cleaned = true;

    for (const artifact of this.artifacts) {
      try {
        await artifact.remove();
      } catch (err) {
        if (isAbsentArtifactError(err)) {
          const absent = new TransientArtifactCleanupError(artifact.description, { cause: err });
          logger.debug(`[${this.requestId}] ${absent.message}`, {
            error: absent.name,
            artifact: absent.artifact,
            cause: errorMessage(absent.cause),
          });
        } else {
          logger.warn(`[${this.requestId}] Failed to remove ${artifact.description}: ${errorMessage(err)}`);
        }
      }
    }
  }
}
