import fs from 'node:fs';
import path from 'node:path';
import { truncateOutput, type Logger, type RenderConfigInput } from '@reelsmith/core';
import type { RunResult, StudioSession } from '../studio/session.js';

export interface CommandIO {
  out(text: string): void;
  err(text: string): void;
}

export const EXIT_RENDER_FAILED = 2;
export const EXIT_CANCELLED = 130;

/** Wait for a submitted render, echoing progress; returns the process exit code. */
export async function waitForRender(
  session: StudioSession,
  run: Omit<RunResult, 'created'>,
  io: CommandIO,
  logger: Logger,
): Promise<number> {
  const offProgress = session.renders.on('progress', ({ id, percent }) => {
    if (id === run.job.id && percent !== null) io.err(`Rendering ${run.job.entryPoint}: ${percent}%`);
  });

  try {
    const { outcome, version } = await run.rendered;
    switch (outcome.status) {
      case 'completed':
        io.out(`Rendered ${version.id} to ${version.videoPath ?? outcome.artifactPath}`);
        return 0;
      case 'cancelled':
        io.err('Render cancelled');
        return EXIT_CANCELLED;
      case 'timed_out':
        io.err(`Render failed: ${outcome.reason}`);
        return EXIT_RENDER_FAILED;
      case 'failed':
        if (outcome.stderr) logger.debug(`renderer stderr:\n${truncateOutput(outcome.stderr)}`);
        io.err(`Render failed: ${outcome.parsedError?.summary ?? outcome.reason}`);
        return EXIT_RENDER_FAILED;
    }
  } finally {
    offProgress();
  }
}

export async function renderCommand(
  session: StudioSession,
  projectId: string,
  versionId: string | undefined,
  config: RenderConfigInput,
  io: CommandIO,
  logger: Logger,
): Promise<number> {
  await session.openProject(projectId);
  const run = await session.renderVersion(versionId, config);
  io.err(`Rendering version ${run.version.id} (${run.job.entryPoint})`);
  return waitForRender(session, run, io, logger);
}

export interface RunFileOptions {
  /** Existing project to add to; a new project is created when omitted. */
  project?: string;
  name?: string;
  prompt?: string;
}

/** Record a scene file as a version of a project and render it. */
export async function runFileCommand(
  session: StudioSession,
  file: string,
  options: RunFileOptions,
  config: RenderConfigInput,
  io: CommandIO,
  logger: Logger,
): Promise<number> {
  const code = fs.readFileSync(file, 'utf-8');
  if (options.project) {
    await session.openProject(options.project);
  } else {
    const project = await session.createProject(options.name ?? path.basename(file, path.extname(file)));
    io.out(`Created project ${project.id} "${project.name}"`);
  }

  const run = await session.runCode(code, { prompt: options.prompt, config });
  if (!run) {
    io.err(`Nothing to render: ${file} is empty`);
    return 1;
  }
  io.out(run.created ? `Recorded version ${run.version.id}` : `Code unchanged; re-rendering ${run.version.id}`);
  return waitForRender(session, run, io, logger);
}
