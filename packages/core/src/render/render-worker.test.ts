import { spawn } from 'node:child_process';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { fakeRenderer, isAlive } from '../../test/helpers.js';
import { WorkerStateError } from '../errors.js';
import { expectedArtifactPath } from './artifact-locator.js';
import { resolveRenderConfig, type RenderConfigInput } from './render-config.js';
import { RenderWorker, type RenderJobSpec, type SpawnFunction } from './render-worker.js';
import { Workspace } from './workspace.js';

let workspace: Workspace;

beforeEach(async () => {
  workspace = await Workspace.create({ prefix: 'reelsmith-worker-' });
});

afterEach(async () => {
  await workspace.purge();
});

async function prepare(code: string, entryPoint = 'Orbit', config: RenderConfigInput = {}): Promise<RenderJobSpec> {
  const source = await workspace.writeSource(code, entryPoint);
  return {
    sourcePath: source.path,
    stem: source.stem,
    entryPoint,
    mediaDir: source.mediaDir,
    config: resolveRenderConfig(config),
  };
}

const SCENE = 'class Orbit(Scene):\n    def construct(self):\n        pass\n';

describe('RenderWorker', () => {
  it('completes and reports the expected artifact', async () => {
    const job = await prepare(SCENE);
    const worker = new RenderWorker({ renderer: fakeRenderer() });

    const outcome = await worker.start(job);

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.success).toBe(true);
    expect(outcome.artifactPath).toBe(expectedArtifactPath('orbit', 'Orbit', 'low', job.mediaDir, 'mp4'));
    expect(outcome.stdout).toBe(`File ready at ${job.mediaDir}\n`);
    expect(worker.state).toBe('completed');
  });

  it('passes quality and format through to the renderer', async () => {
    const job = await prepare(SCENE, 'Orbit', { quality: 'high', format: 'gif' });
    const outcome = await new RenderWorker({ renderer: fakeRenderer() }).start(job);

    expect(outcome).toMatchObject({
      status: 'completed',
      artifactPath: path.join(job.mediaDir, 'videos', 'orbit', '1080p60', 'Orbit.gif'),
    });
  });

  it('falls back to any video under the stem folder', async () => {
    const job = await prepare(`# fake: output=renamed.mp4\n${SCENE}`);
    const outcome = await new RenderWorker({ renderer: fakeRenderer() }).start(job);

    expect(outcome).toMatchObject({
      status: 'completed',
      artifactPath: path.join(job.mediaDir, 'videos', 'orbit', '480p15', 'renamed.mp4'),
    });
  });

  it('fails when the renderer exits cleanly without a video', async () => {
    const job = await prepare(`# fake: no-output\n${SCENE}`);
    const outcome = await new RenderWorker({ renderer: fakeRenderer() }).start(job);

    expect(outcome).toMatchObject({
      status: 'failed',
      reason: 'Render completed but output video not found',
      failure: { kind: 'artifact_not_found', searchRoot: job.mediaDir },
    });
  });

  it('parses the traceback on a non-zero exit', async () => {
    const job = await prepare(`# fake: exit=1\n${SCENE}`);
    const worker = new RenderWorker({ renderer: fakeRenderer() });
    const outcome = await worker.start(job);

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.reason).toBe("Renderer exited with code 1: NameError on line 4: name 'Circl' is not defined");
    expect(outcome.failure).toMatchObject({ kind: 'non_zero_exit', exitCode: 1, signal: null });
    expect(outcome.parsedError).toMatchObject({
      errorType: 'NameError',
      message: "name 'Circl' is not defined",
      lineNumber: 4,
    });
    expect(worker.state).toBe('failed');
  });

  it('kills a renderer that outlives the timeout', async () => {
    const job = await prepare(`# fake: sleep=10\n${SCENE}`, 'Orbit', { timeoutSeconds: 1 });
    const worker = new RenderWorker({ renderer: fakeRenderer() });

    const outcome = await worker.start(job);

    expect(outcome).toMatchObject({
      status: 'timed_out',
      success: false,
      reason: 'Render timed out after 1 seconds',
      elapsedMs: 1000,
    });
    expect(worker.pid).toBeTypeOf('number');
    expect(isAlive(worker.pid ?? -1)).toBe(false);
  }, 10_000);

  it('kills processes the renderer leaves behind when the timeout fires', async () => {
    const job = await prepare(`# fake: linger=8\n${SCENE}`, 'Orbit', { timeoutSeconds: 1 });
    const worker = new RenderWorker({ renderer: fakeRenderer() });
    const startedAt = Date.now();

    const outcome = await worker.start(job);

    expect(outcome.status).toBe('timed_out');
    // The streams only close once the lingering child is gone.
    expect(Date.now() - startedAt).toBeLessThan(5_000);
    expect(outcome.stdout).toMatch(/^linger pid \d+\n/);
  }, 10_000);

  it('reports cancelled when cancelled mid-render', async () => {
    const job = await prepare(`# fake: sleep=10\n${SCENE}`);
    const worker: RenderWorker = new RenderWorker({
      renderer: fakeRenderer(),
      killGraceMs: 500,
      onOutput: () => worker.cancel(),
    });

    const outcome = await worker.start(job);

    expect(outcome.status).toBe('cancelled');
    expect(worker.state).toBe('cancelled');
    expect(isAlive(worker.pid ?? -1)).toBe(false);
  }, 10_000);

  it('cancels through an abort signal', async () => {
    const job = await prepare(`# fake: sleep=10\n${SCENE}`);
    const controller = new AbortController();
    const worker = new RenderWorker({
      renderer: fakeRenderer(),
      killGraceMs: 500,
      onOutput: () => controller.abort(),
    });

    const outcome = await worker.start(job, controller.signal);
    expect(outcome.status).toBe('cancelled');
  }, 10_000);

  it('does not spawn when the signal is already aborted', async () => {
    const job = await prepare(SCENE);
    let spawned = 0;
    const countingSpawn: SpawnFunction = (command, args, options) => {
      spawned += 1;
      return spawn(command, args, options);
    };
    const controller = new AbortController();
    controller.abort();

    const outcome = await new RenderWorker({ renderer: fakeRenderer(), spawn: countingSpawn }).start(job, controller.signal);

    expect(outcome.status).toBe('cancelled');
    expect(spawned).toBe(0);
  });

  it('reports a launch failure for a missing renderer binary', async () => {
    const job = await prepare(SCENE);
    const worker = new RenderWorker({ renderer: { command: '/nonexistent/reelsmith-renderer', args: [] } });

    const outcome = await worker.start(job);

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.failure.kind).toBe('process_launch_failure');
    expect(outcome.reason.startsWith('Failed to launch renderer "/nonexistent/reelsmith-renderer":')).toBe(true);
  });

  it('is single-use', async () => {
    const job = await prepare(SCENE);
    const worker = new RenderWorker({ renderer: fakeRenderer() });
    const first = worker.start(job);

    expect(() => worker.start(job)).toThrow(WorkerStateError);
    await first;
    expect(() => worker.start(job)).toThrow(WorkerStateError);
  });

  it('ignores cancel after a terminal outcome', async () => {
    const job = await prepare(SCENE);
    const worker = new RenderWorker({ renderer: fakeRenderer() });
    const outcome = await worker.start(job);

    worker.cancel();

    expect(worker.state).toBe('completed');
    expect(await worker.done).toBe(outcome);
    expect(outcome.status).toBe('completed');
  });

  it('ignores cancel before start', () => {
    const worker = new RenderWorker({ renderer: fakeRenderer() });
    worker.cancel();
    expect(worker.state).toBe('idle');
    expect(worker.done).toBeNull();
  });
});
