import { randomUUID } from 'node:crypto';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { silentLogger, type Logger } from '../logger.js';

const SOURCE_SUFFIX = '.py';

export interface SourceHandle {
  /** Absolute path of the written source file. */
  path: string;
  /** File name without suffix; the renderer names its output folder after it. */
  stem: string;
  /** Per-job directory holding the source file. */
  jobDir: string;
  /** Per-job media root handed to the renderer. */
  mediaDir: string;
}

/** Lower-case the logical name and replace anything outside [a-z0-9_]. */
export function sourceStem(logicalName: string): string {
  const stem = logicalName.trim().toLowerCase().replace(/[^a-z0-9_]+/g, '_');
  return stem.length > 0 ? stem : 'scene';
}

/**
 * Process-lifetime scratch directory for render sources. Each job gets a
 * fresh subdirectory so two jobs never share a source file or output tree.
 */
export class Workspace {
  private purged = false;

  private constructor(
    readonly root: string,
    private readonly logger: Logger,
  ) {}

  static async create(options: { prefix?: string; logger?: Logger } = {}): Promise<Workspace> {
    const root = await mkdtemp(join(tmpdir(), options.prefix ?? 'reelsmith-'));
    return new Workspace(root, options.logger ?? silentLogger);
  }

  get isPurged(): boolean {
    return this.purged;
  }

  async writeSource(code: string, logicalName: string, options: { mediaRoot?: string } = {}): Promise<SourceHandle> {
    if (this.purged) throw new Error(`Workspace ${this.root} has been purged`);

    const jobId = randomUUID().slice(0, 8);
    const jobDir = join(this.root, 'jobs', jobId);
    const stem = sourceStem(logicalName);
    const path = join(jobDir, `${stem}${SOURCE_SUFFIX}`);
    const mediaDir = options.mediaRoot ? join(options.mediaRoot, jobId) : join(jobDir, 'media');

    await mkdir(jobDir, { recursive: true });
    await mkdir(mediaDir, { recursive: true });
    await writeFile(path, code, 'utf-8');
    this.logger.debug(`wrote ${path}`);
    return { path, stem, jobDir, mediaDir };
  }

  /** Remove the scratch root. Safe to call repeatedly; failures are logged only. */
  async purge(): Promise<void> {
    this.purged = true;
    try {
      await rm(this.root, { recursive: true, force: true });
    } catch (err) {
      this.logger.debug(`could not remove workspace ${this.root}`, err);
    }
  }
}
