import type { Project, VersionStore } from '@reelsmith/core';

function row(project: Project): string {
  return `${project.id}  ${project.name}  updated ${project.updatedAt}`;
}

export async function createProject(store: VersionStore, name: string, description = ''): Promise<string> {
  const project = await store.createProject(name, description);
  return `Created project ${project.id} "${project.name}"`;
}

export async function listProjects(store: VersionStore): Promise<string> {
  const projects = await store.listProjects();
  if (projects.length === 0) return 'No projects yet.';
  return projects.map(row).join('\n');
}

export async function showProject(store: VersionStore, projectId: string): Promise<string> {
  const project = await store.openProject(projectId);
  const versions = await store.listVersions(projectId);
  return [
    `id:              ${project.id}`,
    `name:            ${project.name}`,
    `description:     ${project.description || '(none)'}`,
    `current version: ${project.currentVersionId ?? '(none)'}`,
    `versions:        ${versions.length}`,
    `created:         ${project.createdAt}`,
    `updated:         ${project.updatedAt}`,
    `directory:       ${project.directory}`,
  ].join('\n');
}

export async function renameProject(store: VersionStore, projectId: string, name: string): Promise<string> {
  const project = await store.updateProject(projectId, { name });
  return `Renamed ${project.id} to "${project.name}"`;
}

export async function describeProject(store: VersionStore, projectId: string, description: string): Promise<string> {
  await store.updateProject(projectId, { description });
  return `Updated description of ${projectId}`;
}

export async function deleteProject(store: VersionStore, projectId: string): Promise<string> {
  await store.deleteProject(projectId);
  return `Deleted project ${projectId}`;
}
