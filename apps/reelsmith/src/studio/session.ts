import {
  NotFoundError,
  RenderJobManager,
  silentLogger,
  VersionStore,
  type Logger,
  type Project,
  type Provenance,
  type RenderConfigInput,
  type RendererCommand,
  type RenderJobHandle,
  type RenderOutcome,
  type Version,
} from '@reelsmith/core';

/** Rewrites code, e.g. a slider changing one numeric literal. */
export type CodeTransform = (code: string) => string | Promise<string>;

/** Produces code for a prompt; receives the current code when there is one. */
export type CodeGenerator = (prompt: string, context: { currentCode: string | null }) => Promise<string>;

export interface RunOptions {
  provenance?: Provenance;
  prompt?: string;
  config?: RenderConfigInput;
}

export interface RenderedVersion {
  outcome: RenderOutcome;
  /** The version as stored after the render, with its video attached on success. */
  version: Version;
}

export interface RunResult {
  version: Version;
  /** False when the code matched the current version and no version was added. */
  created: boolean;
  job: RenderJobHandle;
  rendered: Promise<RenderedVersion>;
}

export interface StudioSessionOptions {
  dataDir: string;
  renderer?: RendererCommand;
  logger?: Logger;
  /** Applied to every render; per-call config overrides it. */
  renderDefaults?: RenderConfigInput;
  workspacePrefix?: string;
  killGraceMs?: number;
}

export class NoProjectOpenError extends Error {
  constructor() {
    super('No project is open');
    this.name = 'NoProjectOpenError';
  }
}

export class NoCurrentVersionError extends Error {
  constructor(projectId: string) {
    super(`Project ${projectId} has no versions yet`);
    this.name = 'NoCurrentVersionError';
  }
}

/**
 * One open project wired to a version store and a render manager. Every run
 * records its code as a version first, then renders it and files the video
 * under that version.
 */
export class StudioSession {
  private project: Project | null = null;

  private constructor(
    readonly store: VersionStore,
    readonly renders: RenderJobManager,
    private readonly logger: Logger,
    private readonly renderDefaults: RenderConfigInput,
  ) {}

  static async start(options: StudioSessionOptions): Promise<StudioSession> {
    const logger = options.logger ?? silentLogger;
    const store = new VersionStore({ dataDir: options.dataDir, logger });
    const renders = await RenderJobManager.create({
      renderer: options.renderer,
      logger,
      workspacePrefix: options.workspacePrefix,
      killGraceMs: options.killGraceMs,
    });
    return new StudioSession(store, renders, logger, options.renderDefaults ?? {});
  }

  get currentProject(): Project | null {
    return this.project;
  }

  async createProject(name: string, description = ''): Promise<Project> {
    this.project = await this.store.createProject(name, description);
    return this.project;
  }

  async openProject(projectId: string): Promise<Project> {
    this.project = await this.store.openProject(projectId);
    return this.project;
  }

  async currentVersion(): Promise<Version | null> {
    const project = this.requireProject();
    if (project.currentVersionId === null) return null;
    return this.store.getVersion(project.id, project.currentVersionId);
  }

  /**
   * Record `code` as a child of the current version and render it. Blank code
   * is ignored. Code equal to the current version (ignoring surrounding
   * whitespace) re-renders that version instead of adding a new one.
   */
  async runCode(code: string, options: RunOptions = {}): Promise<RunResult | null> {
    if (!code.trim()) return null;
    const project = this.requireProject();
    const current = await this.currentVersion();

    if (current && current.code.trim() === code.trim()) {
      return { ...this.render(project.id, current, options.config), created: false };
    }

    const version = await this.store.createVersion(project.id, {
      code,
      provenance: options.provenance ?? 'manual-edit',
      prompt: options.prompt,
      parentId: current?.id,
    });
    this.project = { ...project, currentVersionId: version.id, updatedAt: version.createdAt };
    return { ...this.render(project.id, version, options.config), created: true };
  }

  /** Render a stored version as is; defaults to the current one. */
  async renderVersion(versionId?: string, config?: RenderConfigInput): Promise<Omit<RunResult, 'created'>> {
    const project = this.requireProject();
    const id = versionId ?? project.currentVersionId;
    if (id === null) throw new NoCurrentVersionError(project.id);
    const version = await this.store.getVersion(project.id, id);
    return this.render(project.id, version, config);
  }

  /** Apply `transform` to the current code and run the result as a variable tweak. */
  async applyTransform(transform: CodeTransform, config?: RenderConfigInput): Promise<RunResult | null> {
    const current = await this.currentVersion();
    if (!current) throw new NoCurrentVersionError(this.requireProject().id);
    const next = await transform(current.code);
    return this.runCode(next, { provenance: 'variable-tweak', config });
  }

  /** Ask `generator` for code and run it as an AI-generated version carrying the prompt. */
  async generate(generator: CodeGenerator, prompt: string, config?: RenderConfigInput): Promise<RunResult | null> {
    const current = await this.currentVersion();
    const code = await generator(prompt, { currentCode: current?.code ?? null });
    return this.runCode(code, { provenance: 'ai-generated', prompt, config });
  }

  /** Move the project pointer to `versionId` and return its code. */
  async loadVersion(versionId: string): Promise<string> {
    const project = this.requireProject();
    const version = await this.store.getVersion(project.id, versionId);
    this.project = await this.store.setCurrentVersion(project.id, versionId);
    return version.code;
  }

  async history(): Promise<Version[]> {
    return this.store.listVersions(this.requireProject().id);
  }

  cancelRender(): void {
    this.renders.cancel();
  }

  /** Stop any render and remove scratch files. The session is unusable afterwards. */
  async close(): Promise<void> {
    await this.renders.shutdown();
    this.project = null;
  }

  private requireProject(): Project {
    if (!this.project) throw new NoProjectOpenError();
    return this.project;
  }

  private render(projectId: string, version: Version, config?: RenderConfigInput): Omit<RunResult, 'created'> {
    const job = this.renders.submit({
      code: version.code,
      config: { ...this.renderDefaults, ...config },
      label: version.id,
    });
    const rendered = job.outcome.then((outcome) => this.collect(projectId, version, outcome));
    return { version, job, rendered };
  }

  private async collect(projectId: string, version: Version, outcome: RenderOutcome): Promise<RenderedVersion> {
    if (outcome.status !== 'completed') return { outcome, version };
    try {
      const stored = await this.store.importArtifact(projectId, version.id, outcome.artifactPath);
      this.logger.info(`attached ${stored.videoPath ?? outcome.artifactPath} to version ${version.id}`);
      return { outcome, version: stored };
    } catch (err) {
      // The project may have been deleted while the render ran.
      if (err instanceof NotFoundError) {
        this.logger.warn(`version ${version.id} is gone; leaving ${outcome.artifactPath} unattached`);
        return { outcome, version };
      }
      throw err;
    }
  }
}
