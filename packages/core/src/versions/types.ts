import { z } from 'zod';

export const PROVENANCES = ['ai-generated', 'manual-edit', 'variable-tweak'] as const;
export type Provenance = typeof PROVENANCES[number];

export const ARTIFACT_KINDS = ['video', 'thumbnail'] as const;
export type ArtifactKind = typeof ARTIFACT_KINDS[number];

// ── On-disk records ──────────────────────────────────────────────────────────

export const ProjectRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().default(''),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  currentVersionId: z.string().nullable().default(null),
});

export type ProjectRecord = z.infer<typeof ProjectRecordSchema>;

/** version.json; the code lives next to it in its own file. */
export const VersionRecordSchema = z.object({
  id: z.string().min(1),
  projectId: z.string().min(1),
  prompt: z.string().nullable().default(null),
  provenance: z.enum(PROVENANCES),
  parentId: z.string().nullable().default(null),
  createdAt: z.string().datetime(),
  videoPath: z.string().nullable().default(null),
  thumbnailPath: z.string().nullable().default(null),
});

export type VersionRecord = z.infer<typeof VersionRecordSchema>;

/** One line of versions.jsonl. */
export const VersionIndexEntrySchema = z.object({
  id: z.string().min(1),
  parentId: z.string().nullable(),
  createdAt: z.string().datetime(),
});

export type VersionIndexEntry = z.infer<typeof VersionIndexEntrySchema>;

// ── Public shapes ────────────────────────────────────────────────────────────

export interface Project extends ProjectRecord {
  /** Absolute storage directory of the project. */
  directory: string;
}

export interface Version extends VersionRecord {
  code: string;
}

export interface CreateVersionInput {
  code: string;
  provenance: Provenance;
  prompt?: string | null;
  parentId?: string | null;
}

export interface ProjectPatch {
  name?: string;
  description?: string;
}

export type VersionStoreEvents = {
  projectCreated: { project: Project };
  projectUpdated: { project: Project };
  projectDeleted: { projectId: string };
  versionCreated: { version: Version };
  artifactAttached: { version: Version; kind: ArtifactKind; path: string };
};

export function isProvenance(value: string): value is Provenance {
  return PROVENANCES.some((provenance) => provenance === value);
}
