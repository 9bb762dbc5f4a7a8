import fs from 'node:fs';
import { isProvenance, PROVENANCES, type Version, type VersionStore } from '@reelsmith/core';
import { diffVersions, formatDiff } from '../versions/diff.js';

export interface AddVersionOptions {
  parent?: string;
  provenance?: string;
  prompt?: string;
}

export async function addVersion(
  store: VersionStore,
  projectId: string,
  file: string,
  options: AddVersionOptions = {},
): Promise<string> {
  const provenance = options.provenance ?? 'manual-edit';
  if (!isProvenance(provenance)) {
    throw new Error(`Unknown provenance "${provenance}". Expected one of: ${PROVENANCES.join(', ')}`);
  }
  const code = fs.readFileSync(file, 'utf-8');
  const project = await store.openProject(projectId);

  const version = await store.createVersion(projectId, {
    code,
    provenance,
    prompt: options.prompt,
    parentId: options.parent ?? project.currentVersionId ?? undefined,
  });
  return `Created version ${version.id}`;
}

function row(version: Version, currentId: string | null): string {
  const marker = version.id === currentId ? '*' : ' ';
  const video = version.videoPath ? '  [video]' : '';
  const prompt = version.prompt ? `  "${version.prompt}"` : '';
  return `${marker} ${version.id}  ${version.createdAt}  ${version.provenance}${video}${prompt}`;
}

export async function listVersions(store: VersionStore, projectId: string): Promise<string> {
  const project = await store.openProject(projectId);
  const versions = await store.listVersions(projectId);
  if (versions.length === 0) return 'No versions yet.';
  return versions.map((v) => row(v, project.currentVersionId)).join('\n');
}

export async function showVersion(
  store: VersionStore,
  projectId: string,
  versionId: string,
  options: { code?: boolean } = {},
): Promise<string> {
  const version = await store.getVersion(projectId, versionId);
  const lines = [
    `id:         ${version.id}`,
    `parent:     ${version.parentId ?? '(root)'}`,
    `provenance: ${version.provenance}`,
    `prompt:     ${version.prompt ?? '(none)'}`,
    `created:    ${version.createdAt}`,
    `video:      ${version.videoPath ?? '(not rendered)'}`,
  ];
  if (version.thumbnailPath) lines.push(`thumbnail:  ${version.thumbnailPath}`);
  if (options.code) lines.push('', version.code);
  return lines.join('\n');
}

export async function diffVersion(store: VersionStore, projectId: string, fromId: string, toId: string): Promise<string> {
  const [from, to] = await Promise.all([store.getVersion(projectId, fromId), store.getVersion(projectId, toId)]);
  return formatDiff(diffVersions(from.code, to.code));
}

export async function checkoutVersion(store: VersionStore, projectId: string, versionId: string): Promise<string> {
  await store.setCurrentVersion(projectId, versionId);
  return `Current version of ${projectId} is now ${versionId}`;
}

export async function showLineage(store: VersionStore, projectId: string, versionId: string): Promise<string> {
  const chain = await store.lineage(projectId, versionId);
  return chain.map((v, depth) => `${'  '.repeat(depth)}${v.id}  ${v.provenance}`).join('\n');
}
