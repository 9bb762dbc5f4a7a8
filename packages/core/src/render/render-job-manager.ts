import { randomUUID } from 'node:crypto';
import { errorMessage, ManagerClosedError } from '../errors.js';
import { TypedEvents, type Unsubscribe } from '../events.js';
import { silentLogger, type Logger } from '../logger.js';
import { detectEntryPoint } from './entry-point.js';
import { parseProgress } from './output.js';
import {
  resolveRenderConfig,
  type RenderConfig,
  type RenderConfigInput,
  type RendererCommand,
} from './render-config.js';
import { RenderWorker, type RenderOutcome, type SpawnFunction } from './render-worker.js';
import { Workspace } from './workspace.js';

export interface RenderRequest {
  code: string;
  /** Scene class to render; detected from the code when omitted. */
  entryPoint?: string;
  config?: RenderConfigInput;
  /** Caller tag carried through events, e.g. the version being rendered. */
  label?: string;
}

export interface RenderJobHandle {
  id: string;
  entryPoint: string;
  label?: string;
  /** Terminal outcome. Superseded jobs resolve as `cancelled`. */
  outcome: Promise<RenderOutcome>;
}

interface JobRef {
  id: string;
  label?: string;
}

export type RenderJobEvents = {
  started: JobRef & { entryPoint: string; sourcePath: string };
  /** `percent` is null while the renderer reports nothing measurable. */
  progress: JobRef & { percent: number | null };
  finished: JobRef & { artifactPath: string; outcome: RenderOutcome };
  failed: JobRef & { reason: string; outcome: RenderOutcome };
  /** Only for cancellations the caller asked for; supersession is silent. */
  cancelled: JobRef & { outcome: RenderOutcome };
};

export interface RenderJobManagerOptions {
  renderer?: RendererCommand;
  logger?: Logger;
  workspacePrefix?: string;
  spawn?: SpawnFunction;
  killGraceMs?: number;
}

type JobEnd = 'none' | 'superseded' | 'cancelled';

interface ActiveJob {
  id: string;
  label?: string;
  entryPoint: string;
  code: string;
  config: RenderConfig;
  controller: AbortController;
  end: JobEnd;
}

/**
 * Single-flight render orchestrator.
 *
 * Jobs run on one promise chain, so a job spawns only after the one before it
 * has fully terminated: at most one renderer process is alive per manager.
 * Submitting while a job is active supersedes it; a superseded job is
 * cancelled and its outcome produces no event.
 */
export class RenderJobManager {
  private readonly events: TypedEvents<RenderJobEvents>;
  private current: ActiveJob | null = null;
  private tail: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;

  private constructor(
    private readonly workspace: Workspace,
    private readonly options: RenderJobManagerOptions,
    private readonly logger: Logger,
  ) {
    this.events = new TypedEvents<RenderJobEvents>(logger);
  }

  static async create(options: RenderJobManagerOptions = {}): Promise<RenderJobManager> {
    const logger = options.logger ?? silentLogger;
    const workspace = await Workspace.create({ prefix: options.workspacePrefix, logger });
    return new RenderJobManager(workspace, options, logger);
  }

  get workspaceRoot(): string {
    return this.workspace.root;
  }

  /** Id of the job currently holding the slot, if any. */
  get activeJobId(): string | null {
    return this.current?.id ?? null;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  on<E extends keyof RenderJobEvents>(event: E, listener: (payload: RenderJobEvents[E]) => void): Unsubscribe {
    return this.events.on(event, listener);
  }

  /**
   * Queue a render and return at once. Throws synchronously when the manager
   * is shut down or the config fails validation.
   */
  submit(request: RenderRequest): RenderJobHandle {
    if (this.closing) throw new ManagerClosedError();
    const config = resolveRenderConfig(request.config);

    const job: ActiveJob = {
      id: randomUUID(),
      label: request.label,
      entryPoint: request.entryPoint ?? detectEntryPoint(request.code),
      code: request.code,
      config,
      controller: new AbortController(),
      end: 'none',
    };

    const previous = this.current;
    this.current = job;
    if (previous) this.stop(previous, 'superseded');

    const outcome = this.tail.then(() => this.run(job));
    this.tail = outcome.then(() => undefined);
    return { id: job.id, entryPoint: job.entryPoint, label: job.label, outcome };
  }

  /** Cancel the active job, if any. Reported through the `cancelled` event. */
  cancel(): void {
    if (this.current) this.stop(this.current, 'cancelled');
  }

  /**
   * Cancel whatever is running, wait for it to terminate, then purge the
   * workspace. Later calls return the same promise.
   */
  shutdown(): Promise<void> {
    if (!this.closing) {
      if (this.current) this.stop(this.current, 'superseded');
      this.closing = this.tail.then(() => this.workspace.purge()).then(() => this.events.clear());
    }
    return this.closing;
  }

  private stop(job: ActiveJob, end: Exclude<JobEnd, 'none'>): void {
    if (job.end !== 'none') return;
    job.end = end;
    job.controller.abort();
    if (this.current === job) this.current = null;
    this.logger.debug(`job ${job.id} ${end}`);
  }

  private async run(job: ActiveJob): Promise<RenderOutcome> {
    const ref: JobRef = { id: job.id, label: job.label };
    const { config } = job;

    // Superseded or cancelled while queued: never spawn.
    if (job.controller.signal.aborted) return this.report(job, skipped());

    let outcome: RenderOutcome;
    try {
      const source = await this.workspace.writeSource(job.code, job.entryPoint, {
        mediaRoot: config.outputDir,
      });
      if (job.controller.signal.aborted) return this.report(job, skipped());

      const worker = new RenderWorker({
        renderer: this.options.renderer,
        logger: this.logger,
        spawn: this.options.spawn,
        killGraceMs: this.options.killGraceMs,
        onOutput: (chunk) => {
          const percent = parseProgress(chunk);
          if (percent !== null && job.end === 'none') this.events.emit('progress', { ...ref, percent });
        },
      });

      const done = worker.start(
        { sourcePath: source.path, stem: source.stem, entryPoint: job.entryPoint, mediaDir: source.mediaDir, config },
        job.controller.signal,
      );
      // A renderer that never launched has no pid and settles without a `started` event.
      if (worker.state === 'running' && worker.pid !== undefined) {
        this.events.emit('started', { ...ref, entryPoint: job.entryPoint, sourcePath: source.path });
        this.events.emit('progress', { ...ref, percent: null });
      }
      outcome = await done;
    } catch (err) {
      this.logger.error(`job ${job.id} could not be prepared`, err);
      outcome = {
        status: 'failed',
        success: false,
        reason: `Could not prepare render source: ${errorMessage(err)}`,
        failure: { kind: 'process_launch_failure', message: errorMessage(err) },
        parsedError: null,
        elapsedMs: 0,
        stdout: '',
        stderr: '',
      };
    }
    return this.report(job, outcome);
  }

  private report(job: ActiveJob, outcome: RenderOutcome): RenderOutcome {
    if (this.current === job) this.current = null;
    const ref: JobRef = { id: job.id, label: job.label };

    if (job.end === 'superseded') return outcome;
    if (outcome.status === 'cancelled') {
      this.events.emit('cancelled', { ...ref, outcome });
    } else if (outcome.status === 'completed') {
      this.events.emit('finished', { ...ref, artifactPath: outcome.artifactPath, outcome });
    } else {
      this.events.emit('failed', { ...ref, reason: outcome.reason, outcome });
    }
    return outcome;
  }
}

function skipped(): RenderOutcome {
  return { status: 'cancelled', success: false, reason: 'Render cancelled', elapsedMs: 0, stdout: '', stderr: '' };
}
