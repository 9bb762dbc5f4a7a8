#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import {
  createLogger,
  errorMessage,
  MAX_TIMEOUT_SECONDS,
  VersionStore,
  type ConsoleLogger,
  type RenderConfigInput,
} from '@reelsmith/core';
import { CONFIG_FILE, loadConfig, rendererCommand, type CliFlags } from './config/index.js';
import type { Config } from './config/schema.js';
import { setConfig, showConfig } from './commands/config.js';
import {
  createProject,
  deleteProject,
  describeProject,
  listProjects,
  renameProject,
  showProject,
} from './commands/project.js';
import { renderCommand, runFileCommand, type CommandIO } from './commands/render.js';
import {
  addVersion,
  checkoutVersion,
  diffVersion,
  listVersions,
  showLineage,
  showVersion,
} from './commands/version.js';
import { StudioSession } from './studio/session.js';

const VERSION = '0.1.0';

type GlobalOptions = {
  dataDir?: string;
  renderer?: string;
  logLevel?: string;
};

type RenderOptions = {
  quality?: string;
  format?: string;
  timeout?: number;
  cache?: boolean;
};

const io: CommandIO = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0 || seconds > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(`Expected a number of seconds between 0 and ${MAX_TIMEOUT_SECONDS}.`);
  }
  return seconds;
}

const program = new Command()
  .name('reelsmith')
  .description('Version history and rendering for procedural animation scripts')
  .version(VERSION, '-v, --version')
  .option('--data-dir <dir>', 'Where projects are stored (overrides REELSMITH_HOME)')
  .option('--renderer <command>', 'Renderer command line (overrides REELSMITH_RENDERER)')
  .option('--log-level <level>', 'debug, info, warn, error or silent');

function load(extra: CliFlags = {}): { config: Config; logger: ConsoleLogger } {
  const opts = program.opts<GlobalOptions>();
  const config = loadConfig({ dataDir: opts.dataDir, renderer: opts.renderer, logLevel: opts.logLevel, ...extra });
  return { config, logger: createLogger({ level: config.logLevel, scope: 'reelsmith' }) };
}

function openStore(): VersionStore {
  const { config, logger } = load();
  return new VersionStore({ dataDir: config.dataDir, logger: logger.child('store') });
}

/** Run a store-backed command and print what it returns. */
function storeAction<A extends unknown[]>(fn: (store: VersionStore, ...args: A) => Promise<string>) {
  return async (...args: A): Promise<void> => {
    io.out(await fn(openStore(), ...args));
  };
}

/** Open a session for one render, cancelling it on Ctrl-C, and set the exit code. */
async function withSession(
  options: RenderOptions,
  work: (session: StudioSession, config: RenderConfigInput, logger: ConsoleLogger) => Promise<number>,
): Promise<void> {
  const { config, logger } = load({
    quality: options.quality,
    format: options.format,
    timeoutSeconds: options.timeout,
    disableCaching: options.cache === false ? false : undefined,
  });
  const session = await StudioSession.start({
    dataDir: config.dataDir,
    renderer: rendererCommand(config),
    logger: logger.child('studio'),
  });
  const renderConfig: RenderConfigInput = {
    quality: config.quality,
    format: config.format,
    timeoutSeconds: config.timeoutSeconds,
    disableCaching: config.disableCaching,
  };

  const onInterrupt = () => {
    io.err('Cancelling render...');
    session.cancelRender();
  };
  process.once('SIGINT', onInterrupt);
  try {
    process.exitCode = await work(session, renderConfig, logger);
  } finally {
    process.off('SIGINT', onInterrupt);
    await session.close();
  }
}

function addRenderOptions(command: Command): Command {
  return command
    .option('-q, --quality <preset>', 'low, medium, high or ultra')
    .option('-f, --format <ext>', 'mp4, mov, gif or webm')
    .option('--timeout <seconds>', 'Kill the renderer after this many seconds', parseSeconds)
    .option('--no-cache', 'Let the renderer reuse its cache');
}

// ── project ─────────────────────────────────────────────────────────────────

const project = program.command('project').description('Manage projects');

project
  .command('create <name>')
  .description('Create an empty project')
  .option('-d, --description <text>', 'Project description', '')
  .action(async (name: string, opts: { description: string }) => {
    io.out(await createProject(openStore(), name, opts.description));
  });

project
  .command('list')
  .description('List projects, most recently updated first')
  .action(storeAction((store) => listProjects(store)));

project
  .command('show <projectId>')
  .description('Show project details')
  .action(storeAction((store, projectId: string) => showProject(store, projectId)));

project
  .command('rename <projectId> <name>')
  .description('Rename a project')
  .action(storeAction((store, projectId: string, name: string) => renameProject(store, projectId, name)));

project
  .command('describe <projectId> <description>')
  .description('Replace a project description')
  .action(storeAction((store, projectId: string, text: string) => describeProject(store, projectId, text)));

project
  .command('delete <projectId>')
  .description('Delete a project and all of its versions')
  .action(storeAction((store, projectId: string) => deleteProject(store, projectId)));

// ── version ─────────────────────────────────────────────────────────────────

const version = program.command('version').description('Inspect and edit version history');

version
  .command('add <projectId> <file>')
  .description('Record the contents of a file as a new version')
  .option('-p, --parent <versionId>', 'Parent version (defaults to the current version)')
  .option('--provenance <kind>', 'ai-generated, manual-edit or variable-tweak', 'manual-edit')
  .option('--prompt <text>', 'Prompt that produced the code')
  .action(async (projectId: string, file: string, opts: { parent?: string; provenance: string; prompt?: string }) => {
    io.out(await addVersion(openStore(), projectId, file, opts));
  });

version
  .command('list <projectId>')
  .description('List versions in creation order; * marks the current one')
  .action(storeAction((store, projectId: string) => listVersions(store, projectId)));

version
  .command('show <projectId> <versionId>')
  .description('Show version details')
  .option('-c, --code', 'Print the code as well')
  .action(async (projectId: string, versionId: string, opts: { code?: boolean }) => {
    io.out(await showVersion(openStore(), projectId, versionId, opts));
  });

version
  .command('diff <projectId> <fromVersionId> <toVersionId>')
  .description('Show a line diff between two versions')
  .action(storeAction((store, projectId: string, from: string, to: string) => diffVersion(store, projectId, from, to)));

version
  .command('checkout <projectId> <versionId>')
  .description('Make a version the current one')
  .action(storeAction((store, projectId: string, versionId: string) => checkoutVersion(store, projectId, versionId)));

version
  .command('lineage <projectId> <versionId>')
  .description('Show the chain of ancestors from the root to a version')
  .action(storeAction((store, projectId: string, versionId: string) => showLineage(store, projectId, versionId)));

// ── render / run ────────────────────────────────────────────────────────────

addRenderOptions(
  program
    .command('render <projectId> [versionId]')
    .description('Render a version (the current one by default) and attach the video'),
).action(async (projectId: string, versionId: string | undefined, opts: RenderOptions) => {
  await withSession(opts, (session, config, logger) => renderCommand(session, projectId, versionId, config, io, logger));
});

addRenderOptions(
  program
    .command('run <file>')
    .description('Record a scene file as a new version and render it')
    .option('-p, --project <projectId>', 'Add to this project instead of creating one')
    .option('-n, --name <name>', 'Name for the new project (defaults to the file name)')
    .option('--prompt <text>', 'Prompt that produced the code'),
).action(async (file: string, opts: RenderOptions & { project?: string; name?: string; prompt?: string }) => {
  await withSession(opts, (session, config, logger) => runFileCommand(session, file, opts, config, io, logger));
});

// ── config ──────────────────────────────────────────────────────────────────

const configCommand = program.command('config').description('Show or change stored settings');

configCommand
  .command('show')
  .description('Print the effective configuration')
  .action(() => {
    io.out(showConfig(load().config));
  });

configCommand
  .command('set <key> <value>')
  .description(`Store a default in ${CONFIG_FILE}`)
  .action((key: string, value: string) => {
    io.out(setConfig(key, value));
  });

async function main(): Promise<void> {
  await program.parseAsync();
}

main().catch((err: unknown) => {
  process.stderr.write(`Error: ${errorMessage(err)}\n`);
  process.exit(1);
});
