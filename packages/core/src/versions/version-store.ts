import { randomUUID } from 'node:crypto';
import { appendFile, copyFile, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  CorruptRecordError,
  errorMessage,
  NotFoundError,
  ParentNotFoundError,
  StorageError,
} from '../errors.js';
import { TypedEvents, type Unsubscribe } from '../events.js';
import { silentLogger, type Logger } from '../logger.js';
import { ensureDir, isMissingFileError, readJson, writeJson } from './json-files.js';
import { KeyedLock } from './keyed-lock.js';
import {
  ProjectRecordSchema,
  VersionIndexEntrySchema,
  VersionRecordSchema,
  type ArtifactKind,
  type CreateVersionInput,
  type Project,
  type ProjectPatch,
  type ProjectRecord,
  type Version,
  type VersionIndexEntry,
  type VersionRecord,
  type VersionStoreEvents,
} from './types.js';

// ── Storage layout ───────────────────────────────────────────────────────────
//  <dataDir>/projects/<projectId>/
//    project.json              : ProjectRecord
//    versions.jsonl            : append-only index, one VersionIndexEntry per line
//    versions/<versionId>/
//      version.json            : VersionRecord (no code)
//      scene.py                : code snapshot, written once
//      media/                  : copied-in video / thumbnail

const PROJECT_FILE = 'project.json';
const INDEX_FILE = 'versions.jsonl';
const VERSION_FILE = 'version.json';
const CODE_FILE = 'scene.py';
const MEDIA_DIR = 'media';

const ID_RE = /^[A-Za-z0-9_-]+$/;

export interface VersionStoreOptions {
  /** Root data directory; projects live under `<dataDir>/projects`. */
  dataDir: string;
  logger?: Logger;
  /** Clock for timestamps (tests pin it). */
  now?: () => Date;
}

/**
 * Durable, append-only history of projects and their code versions.
 *
 * Writes to one project are serialized (id allocation, parent validation,
 * index append and pointer update happen as one step); different projects
 * never wait on each other.
 */
export class VersionStore {
  readonly projectsDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly lock = new KeyedLock();
  private readonly events: TypedEvents<VersionStoreEvents>;

  constructor(options: VersionStoreOptions) {
    this.projectsDir = path.join(options.dataDir, 'projects');
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.events = new TypedEvents<VersionStoreEvents>(this.logger);
  }

  on<E extends keyof VersionStoreEvents>(event: E, listener: (payload: VersionStoreEvents[E]) => void): Unsubscribe {
    return this.events.on(event, listener);
  }

  projectDir(projectId: string): string {
    return path.join(this.projectsDir, projectId);
  }

  versionDir(projectId: string, versionId: string): string {
    return path.join(this.projectDir(projectId), 'versions', versionId);
  }

  // ── Projects ───────────────────────────────────────────────────────────────

  async createProject(name: string, description = ''): Promise<Project> {
    const id = randomUUID();
    const now = this.now().toISOString();
    const record: ProjectRecord = {
      id,
      name,
      description,
      createdAt: now,
      updatedAt: now,
      currentVersionId: null,
    };

    const dir = this.projectDir(id);
    try {
      await ensureDir(path.join(dir, 'versions'));
      await writeFile(path.join(dir, INDEX_FILE), '', 'utf-8');
      await writeJson(path.join(dir, PROJECT_FILE), record);
    } catch (err) {
      throw new StorageError(`Could not create project storage at ${dir}: ${errorMessage(err)}`, { cause: err });
    }

    const project = this.toProject(record);
    this.logger.info(`created project ${id} "${name}"`);
    this.events.emit('projectCreated', { project });
    return project;
  }

  async openProject(projectId: string): Promise<Project> {
    return this.toProject(await this.readProject(projectId));
  }

  /** All readable projects, most recently updated first. Corrupt ones are logged and skipped. */
  async listProjects(): Promise<Project[]> {
    let names: string[];
    try {
      names = await readdir(this.projectsDir);
    } catch (err) {
      if (isMissingFileError(err)) return [];
      throw new StorageError(`Could not list ${this.projectsDir}: ${errorMessage(err)}`, { cause: err });
    }

    const projects: Project[] = [];
    for (const name of names) {
      if (!ID_RE.test(name)) continue;
      try {
        projects.push(this.toProject(await this.readProject(name)));
      } catch (err) {
        if (err instanceof CorruptRecordError) {
          this.logger.warn(err.message);
        } else if (!(err instanceof NotFoundError)) {
          throw err;
        }
      }
    }

    return projects.sort(
      (a, b) => b.updatedAt.localeCompare(a.updatedAt) || b.createdAt.localeCompare(a.createdAt),
    );
  }

  async updateProject(projectId: string, patch: ProjectPatch): Promise<Project> {
    return this.lock.run(projectId, async () => {
      const record = await this.readProject(projectId);
      const next: ProjectRecord = {
        ...record,
        name: patch.name ?? record.name,
        description: patch.description ?? record.description,
        updatedAt: this.now().toISOString(),
      };
      await this.writeProject(next);
      const project = this.toProject(next);
      this.events.emit('projectUpdated', { project });
      return project;
    });
  }

  /** Remove the project and everything beneath it. Succeeds if already gone. */
  async deleteProject(projectId: string): Promise<void> {
    if (!ID_RE.test(projectId)) return;
    await this.lock.run(projectId, async () => {
      const dir = this.projectDir(projectId);
      let existed = true;
      try {
        await readdir(dir);
      } catch (err) {
        if (!isMissingFileError(err)) throw new StorageError(`Could not read ${dir}: ${errorMessage(err)}`, { cause: err });
        existed = false;
      }
      if (!existed) return;

      try {
        await rm(dir, { recursive: true, force: true });
      } catch (err) {
        throw new StorageError(`Could not delete project ${projectId}: ${errorMessage(err)}`, { cause: err });
      }
      this.logger.info(`deleted project ${projectId}`);
      this.events.emit('projectDeleted', { projectId });
    });
  }

  /** Point the project at an existing version of its own history. */
  async setCurrentVersion(projectId: string, versionId: string): Promise<Project> {
    return this.lock.run(projectId, async () => {
      const record = await this.readProject(projectId);
      const index = await this.readIndex(projectId);
      if (!index.some((entry) => entry.id === versionId)) throw new NotFoundError('version', versionId);

      const next: ProjectRecord = { ...record, currentVersionId: versionId, updatedAt: this.now().toISOString() };
      await this.writeProject(next);
      const project = this.toProject(next);
      this.events.emit('projectUpdated', { project });
      return project;
    });
  }

  // ── Versions ───────────────────────────────────────────────────────────────

  /**
   * Append a code snapshot. The parent, when given, must already belong to
   * this project. The project's current-version pointer moves to the new
   * version.
   */
  async createVersion(projectId: string, input: CreateVersionInput): Promise<Version> {
    return this.lock.run(projectId, async () => {
      const project = await this.readProject(projectId);
      const index = await this.readIndex(projectId);

      const parentId = input.parentId ?? null;
      if (parentId !== null && !index.some((entry) => entry.id === parentId)) {
        throw new ParentNotFoundError(projectId, parentId);
      }

      // Keep creation timestamps non-decreasing even if the clock steps back.
      let createdAt = this.now().toISOString();
      const last = index[index.length - 1];
      if (last && last.createdAt > createdAt) createdAt = last.createdAt;

      const record: VersionRecord = {
        id: randomUUID(),
        projectId,
        prompt: input.prompt ?? null,
        provenance: input.provenance,
        parentId,
        createdAt,
        videoPath: null,
        thumbnailPath: null,
      };
      const entry: VersionIndexEntry = { id: record.id, parentId, createdAt };
      const dir = this.versionDir(projectId, record.id);

      try {
        await ensureDir(path.join(dir, MEDIA_DIR));
        await writeFile(path.join(dir, CODE_FILE), input.code, 'utf-8');
        await writeJson(path.join(dir, VERSION_FILE), record);
        await appendFile(path.join(this.projectDir(projectId), INDEX_FILE), `${JSON.stringify(entry)}\n`, 'utf-8');
        await this.writeProject({ ...project, currentVersionId: record.id, updatedAt: createdAt });
      } catch (err) {
        throw new StorageError(`Could not write version to ${dir}: ${errorMessage(err)}`, { cause: err });
      }

      const version: Version = { ...record, code: input.code };
      this.logger.debug(`created version ${record.id} (${input.provenance}) in ${projectId}`);
      this.events.emit('versionCreated', { version });
      this.events.emit('projectUpdated', {
        project: this.toProject({ ...project, currentVersionId: record.id, updatedAt: createdAt }),
      });
      return version;
    });
  }

  async getVersion(projectId: string, versionId: string): Promise<Version> {
    await this.readProject(projectId);
    return this.readVersion(projectId, versionId);
  }

  /** Versions in creation order, read through the project's index. */
  async listVersions(projectId: string): Promise<Version[]> {
    await this.readProject(projectId);
    const index = await this.readIndex(projectId);
    return Promise.all(index.map((entry) => this.readVersion(projectId, entry.id)));
  }

  async latestVersion(projectId: string): Promise<Version | null> {
    await this.readProject(projectId);
    const index = await this.readIndex(projectId);
    const last = index[index.length - 1];
    return last ? this.readVersion(projectId, last.id) : null;
  }

  /** Ancestors of `versionId` from the root down to the version itself. */
  async lineage(projectId: string, versionId: string): Promise<Version[]> {
    await this.readProject(projectId);
    const index = await this.readIndex(projectId);
    const parents = new Map(index.map((entry) => [entry.id, entry.parentId]));
    if (!parents.has(versionId)) throw new NotFoundError('version', versionId);

    const chain: string[] = [];
    const seen = new Set<string>();
    let cursor: string | null = versionId;
    while (cursor !== null) {
      if (seen.has(cursor)) {
        throw new CorruptRecordError('project', projectId, path.join(this.projectDir(projectId), INDEX_FILE));
      }
      seen.add(cursor);
      chain.push(cursor);
      cursor = parents.get(cursor) ?? null;
    }
    return Promise.all(chain.reverse().map((id) => this.readVersion(projectId, id)));
  }

  /** Record a rendered artifact on a version. The only mutation a version allows. */
  async attachArtifact(
    projectId: string,
    versionId: string,
    artifactPath: string,
    kind: ArtifactKind = 'video',
  ): Promise<Version> {
    return this.lock.run(projectId, async () => {
      await this.readProject(projectId);
      const version = await this.readVersion(projectId, versionId);
      const { code, ...record } = version;
      const next: VersionRecord = kind === 'video'
        ? { ...record, videoPath: artifactPath }
        : { ...record, thumbnailPath: artifactPath };

      try {
        await writeJson(path.join(this.versionDir(projectId, versionId), VERSION_FILE), next);
      } catch (err) {
        throw new StorageError(`Could not attach ${kind} to version ${versionId}: ${errorMessage(err)}`, { cause: err });
      }

      const updated: Version = { ...next, code };
      this.events.emit('artifactAttached', { version: updated, kind, path: artifactPath });
      return updated;
    });
  }

  /** Copy a rendered file into the version's media folder, then attach the copy. */
  async importArtifact(
    projectId: string,
    versionId: string,
    sourcePath: string,
    kind: ArtifactKind = 'video',
  ): Promise<Version> {
    await this.getVersion(projectId, versionId);
    const target = path.join(this.versionDir(projectId, versionId), MEDIA_DIR, path.basename(sourcePath));
    try {
      await ensureDir(path.dirname(target));
      await copyFile(sourcePath, target);
    } catch (err) {
      throw new StorageError(`Could not copy ${sourcePath} into version ${versionId}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return this.attachArtifact(projectId, versionId, target, kind);
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private toProject(record: ProjectRecord): Project {
    return { ...record, directory: this.projectDir(record.id) };
  }

  private async readProject(projectId: string): Promise<ProjectRecord> {
    if (!ID_RE.test(projectId)) throw new NotFoundError('project', projectId);
    const file = path.join(this.projectDir(projectId), PROJECT_FILE);
    const result = await readJson(file, ProjectRecordSchema);
    if (result.kind === 'missing') throw new NotFoundError('project', projectId);
    if (result.kind === 'corrupt' || result.value.id !== projectId) {
      throw new CorruptRecordError('project', projectId, file, {
        cause: result.kind === 'corrupt' ? result.cause : undefined,
      });
    }
    return result.value;
  }

  private async writeProject(record: ProjectRecord): Promise<void> {
    const file = path.join(this.projectDir(record.id), PROJECT_FILE);
    try {
      await writeJson(file, record);
    } catch (err) {
      throw new StorageError(`Could not write ${file}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async readIndex(projectId: string): Promise<VersionIndexEntry[]> {
    const file = path.join(this.projectDir(projectId), INDEX_FILE);
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (err) {
      if (isMissingFileError(err)) return [];
      throw new CorruptRecordError('project', projectId, file, { cause: err });
    }

    const entries: VersionIndexEntry[] = [];
    for (const line of text.split('\n')) {
      if (!line.trim()) continue;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (err) {
        throw new CorruptRecordError('project', projectId, file, { cause: err });
      }
      const parsed = VersionIndexEntrySchema.safeParse(raw);
      if (!parsed.success) throw new CorruptRecordError('project', projectId, file, { cause: parsed.error });
      entries.push(parsed.data);
    }
    return entries;
  }

  private async readVersion(projectId: string, versionId: string): Promise<Version> {
    if (!ID_RE.test(versionId)) throw new NotFoundError('version', versionId);
    const dir = this.versionDir(projectId, versionId);
    const file = path.join(dir, VERSION_FILE);

    const result = await readJson(file, VersionRecordSchema);
    if (result.kind === 'missing') throw new NotFoundError('version', versionId);
    if (result.kind === 'corrupt' || result.value.id !== versionId || result.value.projectId !== projectId) {
      throw new CorruptRecordError('version', versionId, file, {
        cause: result.kind === 'corrupt' ? result.cause : undefined,
      });
    }

    let code: string;
    try {
      code = await readFile(path.join(dir, CODE_FILE), 'utf-8');
    } catch (err) {
      throw new CorruptRecordError('version', versionId, path.join(dir, CODE_FILE), { cause: err });
    }
    return { ...result.value, code };
  }
}
