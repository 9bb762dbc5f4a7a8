import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { errorMessage, WorkerStateError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { locateArtifact } from './artifact-locator.js';
import { parseRenderError, type ParsedRenderError } from './error-parser.js';
import { stderrTail } from './output.js';
import {
  buildRendererArgs,
  DEFAULT_RENDERER,
  type RenderConfig,
  type RendererCommand,
} from './render-config.js';

// ── Outcome model ────────────────────────────────────────────────────────────

export type RenderWorkerState = 'idle' | 'running' | 'completed' | 'failed' | 'timed_out' | 'cancelled';

export type RenderFailure =
  | { kind: 'process_launch_failure'; message: string }
  | { kind: 'non_zero_exit'; exitCode: number | null; signal: NodeJS.Signals | null; stderrTail: string }
  | { kind: 'artifact_not_found'; searchRoot: string };

interface OutcomeBase {
  elapsedMs: number;
  stdout: string;
  stderr: string;
}

export type RenderOutcome =
  | (OutcomeBase & { status: 'completed'; success: true; artifactPath: string })
  | (OutcomeBase & {
      status: 'failed';
      success: false;
      reason: string;
      failure: RenderFailure;
      parsedError: ParsedRenderError | null;
    })
  | (OutcomeBase & { status: 'timed_out'; success: false; reason: string })
  | (OutcomeBase & { status: 'cancelled'; success: false; reason: string });

export interface RenderJobSpec {
  sourcePath: string;
  /** Source file stem; the renderer names its video folder after it. */
  stem: string;
  entryPoint: string;
  mediaDir: string;
  config: RenderConfig;
}

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface RenderWorkerOptions {
  renderer?: RendererCommand;
  logger?: Logger;
  /** Injection point for tests; defaults to node:child_process spawn. */
  spawn?: SpawnFunction;
  /** Delay between SIGTERM and SIGKILL on cancellation. */
  killGraceMs?: number;
  onOutput?: (chunk: string, stream: 'stdout' | 'stderr') => void;
}

const DEFAULT_KILL_GRACE_MS = 2_000;

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

// ── Worker ───────────────────────────────────────────────────────────────────

/**
 * Runs one renderer subprocess to a single terminal outcome.
 *
 * idle → running → completed | failed | timed_out | cancelled
 *
 * The subprocess gets its own process group so timeout and cancellation
 * reach anything it forks. A worker is single-use.
 */
export class RenderWorker {
  private _state: RenderWorkerState = 'idle';
  private child: ChildProcess | null = null;
  private startedAt = 0;
  private termination: 'cancel' | 'timeout' | null = null;
  private timeoutTimer: NodeJS.Timeout | null = null;
  private graceTimer: NodeJS.Timeout | null = null;
  private outcome: Promise<RenderOutcome> | null = null;
  private readonly renderer: RendererCommand;
  private readonly logger: Logger;
  private readonly spawnProcess: SpawnFunction;
  private readonly detached = process.platform !== 'win32';

  constructor(private readonly options: RenderWorkerOptions = {}) {
    this.renderer = options.renderer ?? DEFAULT_RENDERER;
    this.logger = options.logger ?? silentLogger;
    this.spawnProcess = options.spawn ?? spawn;
  }

  get state(): RenderWorkerState {
    return this._state;
  }

  /** PID of the renderer once spawned. */
  get pid(): number | undefined {
    return this.child?.pid;
  }

  /** The terminal outcome, once `start` has been called. */
  get done(): Promise<RenderOutcome> | null {
    return this.outcome;
  }

  /**
   * Launch the renderer and return immediately. The promise resolves with the
   * terminal outcome and never rejects.
   */
  start(job: RenderJobSpec, signal?: AbortSignal): Promise<RenderOutcome> {
    if (this._state !== 'idle') throw new WorkerStateError(this._state);
    this._state = 'running';
    this.startedAt = Date.now();

    this.outcome = new Promise<RenderOutcome>((resolve) => {
      const settle = (outcome: RenderOutcome) => {
        this.clearTimers();
        this._state = outcome.status;
        this.logger.debug(`render ${job.entryPoint} ${outcome.status} in ${outcome.elapsedMs}ms`);
        resolve(outcome);
      };

      if (signal?.aborted) {
        this.termination = 'cancel';
        settle(this.cancelledOutcome('', ''));
        return;
      }
      signal?.addEventListener('abort', () => this.cancel(), { once: true });
      this.launch(job, settle);
    });
    return this.outcome;
  }

  /**
   * Ask the renderer to stop. The outcome becomes `cancelled` whatever exit
   * code the process ends with. No-op unless running.
   */
  cancel(): void {
    if (this._state !== 'running' || this.termination !== null) return;
    this.termination = 'cancel';
    this.logger.debug(`cancelling renderer pid ${this.pid ?? '-'}`);
    this.kill('SIGTERM');
    const grace = this.options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.graceTimer = setTimeout(() => this.kill('SIGKILL'), grace);
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private launch(job: RenderJobSpec, settle: (outcome: RenderOutcome) => void): void {
    const args = buildRendererArgs(this.renderer, job);
    let stdout = '';
    let stderr = '';
    let settled = false;
    const once = (outcome: RenderOutcome) => {
      if (settled) return;
      settled = true;
      settle(outcome);
    };
    const launchFailed = (err: unknown) => {
      const message = errorMessage(err);
      once({
        status: 'failed',
        success: false,
        reason: `Failed to launch renderer "${this.renderer.command}": ${message}`,
        failure: { kind: 'process_launch_failure', message },
        parsedError: null,
        elapsedMs: this.elapsed(),
        stdout,
        stderr,
      });
    };

    this.logger.debug(`spawn ${this.renderer.command} ${args.join(' ')}`);
    let child: ChildProcess;
    try {
      child = this.spawnProcess(this.renderer.command, args, {
        detached: this.detached,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...this.renderer.env },
      });
    } catch (err) {
      launchFailed(err);
      return;
    }
    this.child = child;

    child.stdout?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      stdout += chunk;
      this.options.onOutput?.(chunk, 'stdout');
    });
    child.stderr?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      stderr += chunk;
      this.options.onOutput?.(chunk, 'stderr');
    });

    const timeoutMs = job.config.timeoutSeconds * 1000;
    this.timeoutTimer = setTimeout(() => {
      if (this.termination !== null) return;
      this.termination = 'timeout';
      this.logger.warn(`render ${job.entryPoint} exceeded ${job.config.timeoutSeconds}s, killing pid ${this.pid ?? '-'}`);
      this.kill('SIGKILL');
    }, timeoutMs);

    child.once('error', (err) => {
      // Errors after a successful spawn (e.g. a failed kill) surface through 'close'.
      if (child.pid === undefined) {
        launchFailed(err);
      } else {
        this.logger.warn(`renderer pid ${child.pid} error`, err);
      }
    });

    child.once('close', (code, signal) => {
      this.clearTimers();
      this.finish(job, code, signal, stdout, stderr).then(once, (err: unknown) => {
        this.logger.error('render result handling failed', err);
        once({
          status: 'failed',
          success: false,
          reason: `Render result handling failed: ${errorMessage(err)}`,
          failure: { kind: 'artifact_not_found', searchRoot: job.mediaDir },
          parsedError: null,
          elapsedMs: this.elapsed(),
          stdout,
          stderr,
        });
      });
    });
  }

  private async finish(
    job: RenderJobSpec,
    exitCode: number | null,
    signal: NodeJS.Signals | null,
    stdout: string,
    stderr: string,
  ): Promise<RenderOutcome> {
    if (this.termination === 'cancel') return this.cancelledOutcome(stdout, stderr);
    if (this.termination === 'timeout') {
      return {
        status: 'timed_out',
        success: false,
        reason: `Render timed out after ${job.config.timeoutSeconds} seconds`,
        elapsedMs: job.config.timeoutSeconds * 1000,
        stdout,
        stderr,
      };
    }

    if (exitCode !== 0) {
      const parsedError = parseRenderError(stderr, job.sourcePath);
      const how = exitCode === null ? `was killed by ${signal ?? 'a signal'}` : `exited with code ${exitCode}`;
      return {
        status: 'failed',
        success: false,
        reason: `Renderer ${how}: ${parsedError.summary}`,
        failure: { kind: 'non_zero_exit', exitCode, signal, stderrTail: stderrTail(stderr) },
        parsedError,
        elapsedMs: this.elapsed(),
        stdout,
        stderr,
      };
    }

    const artifactPath = await locateArtifact(
      job.stem,
      job.entryPoint,
      job.config.quality,
      job.mediaDir,
      job.config.format,
    );
    // A cancel that lands while we were searching still wins.
    if (this.termination === 'cancel') return this.cancelledOutcome(stdout, stderr);

    if (artifactPath === null) {
      return {
        status: 'failed',
        success: false,
        reason: 'Render completed but output video not found',
        failure: { kind: 'artifact_not_found', searchRoot: job.mediaDir },
        parsedError: null,
        elapsedMs: this.elapsed(),
        stdout,
        stderr,
      };
    }
    return { status: 'completed', success: true, artifactPath, elapsedMs: this.elapsed(), stdout, stderr };
  }

  private cancelledOutcome(stdout: string, stderr: string): RenderOutcome {
    return { status: 'cancelled', success: false, reason: 'Render cancelled', elapsedMs: this.elapsed(), stdout, stderr };
  }

  private elapsed(): number {
    return Date.now() - this.startedAt;
  }

  /**
   * Signal the whole process group. The group outlives its leader while any
   * member still runs, so this does not check whether the leader has exited.
   */
  private kill(signal: NodeJS.Signals): void {
    const child = this.child;
    if (!child || child.pid === undefined) return;

    if (this.detached) {
      try {
        process.kill(-child.pid, signal);
        return;
      } catch (err) {
        if (isNoSuchProcess(err)) return;
        this.logger.debug(`process group kill failed for pid ${child.pid}`, err);
      }
    }
    if (child.exitCode !== null || child.signalCode !== null) return;
    child.kill(signal);
  }

  private clearTimers(): void {
    if (this.timeoutTimer) clearTimeout(this.timeoutTimer);
    if (this.graceTimer) clearTimeout(this.graceTimer);
    this.timeoutTimer = null;
    this.graceTimer = null;
  }
}
