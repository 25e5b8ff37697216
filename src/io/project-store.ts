/**
 * JSON-file project store
 *
 * The registry lives at `<dataDir>/projects.json`; each project's run state
 * lives inside its workspace at `<workspace>/.handoff/state.json`.
 */

import { randomUUID } from 'crypto';
import type { FileSystem } from '../types/file-system';
import type { Logger } from '../types/logger';
import { projectKey } from '../types/project';
import type { Project, ProjectState } from '../types/project';
import type { NewProjectInput, ProjectStore } from '../types/project-store';
import { PersistenceError, ValidationError } from '../types/errors';
import { parseProjectState, parseProjectsFile } from '../schemas/validators';
import type { ProjectsFile } from '../schemas/validators';

export const PROJECTS_FILE_NAME = 'projects.json';
export const STATE_FILE_NAME = 'state.json';

export interface JsonProjectStoreOptions {
  fileSystem: FileSystem;
  dataDirectory: string;
  /** Directory inside each workspace holding state.json */
  stateDirName: string;
  logger: Logger;
  generateId?: () => string;
}

export class JsonProjectStore implements ProjectStore {
  private readonly fs: FileSystem;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly projectsPath: string;

  constructor(private readonly options: JsonProjectStoreOptions) {
    this.fs = options.fileSystem;
    this.logger = options.logger;
    this.generateId = options.generateId ?? randomUUID;
    this.projectsPath = this.fs.join(options.dataDirectory, PROJECTS_FILE_NAME);
  }

  async loadProjects(): Promise<Project[]> {
    const file = await this.readRegistry();

    // Registries written by hand may lack ids; assign them once and save
    const missing = file.projects.filter((p) => p.id === undefined);
    if (missing.length > 0) {
      const projects = file.projects.map((p) => (p.id === undefined ? { ...p, id: this.generateId() } : p));
      await this.writeRegistry({ ...file, projects });
      this.logger.info(`Assigned ids to ${missing.length} project(s)`);
      return projects;
    }
    return file.projects;
  }

  async addProject(input: NewProjectInput): Promise<Project> {
    const name = input.name.trim();
    const goal = input.overallGoal.trim();

    if (name === '') {
      throw new ValidationError('Project name cannot be empty', 'name');
    }
    if (goal === '') {
      throw new ValidationError('Overall goal cannot be empty', 'overallGoal');
    }
    if (!this.fs.isAbsolute(input.workspaceRootPath)) {
      throw new ValidationError(
        `Workspace path must be absolute: ${input.workspaceRootPath}`,
        'workspaceRootPath'
      );
    }
    const stats = await this.fs.stat(input.workspaceRootPath);
    if (!stats.ok || !stats.value.isDirectory) {
      throw new ValidationError(
        `Workspace path is not an existing directory: ${input.workspaceRootPath}`,
        'workspaceRootPath'
      );
    }

    const projects = await this.loadProjects();
    if (projects.some((p) => p.name === name)) {
      throw new ValidationError(`A project named "${name}" already exists`, 'name');
    }

    const project: Project = {
      name,
      workspaceRootPath: this.fs.resolve(input.workspaceRootPath),
      overallGoal: goal,
      id: this.generateId(),
    };
    await this.writeRegistry({ schemaVersion: '1.0.0', projects: [...projects, project] });
    this.logger.info(`Added project ${name}`, { project: name });
    return project;
  }

  async getProjectByName(name: string): Promise<Project | undefined> {
    const projects = await this.loadProjects();
    return projects.find((p) => p.name === name);
  }

  async getProjectById(id: string): Promise<Project | undefined> {
    const projects = await this.loadProjects();
    return projects.find((p) => p.id === id);
  }

  statePath(project: Project): string {
    return this.fs.join(project.workspaceRootPath, this.options.stateDirName, STATE_FILE_NAME);
  }

  async loadProjectState(project: Project): Promise<ProjectState | null> {
    const path = this.statePath(project);
    const read = await this.fs.readFile(path);
    if (!read.ok) {
      if (read.error.code === 'NOT_FOUND') {
        return null;
      }
      throw new PersistenceError(`Failed to read state for ${project.name}: ${read.error.message}`, {
        cause: read.error.cause,
      });
    }

    const parsed = parseProjectState(read.value);
    if (!parsed.success || !parsed.data) {
      const detail = (parsed.errors ?? ['unknown error']).join('; ');
      throw new PersistenceError(`Invalid saved state for ${project.name}: ${detail}`);
    }
    if (parsed.data.projectId !== projectKey(project)) {
      this.logger.warn(`Saved state belongs to ${parsed.data.projectId}, rebinding to ${projectKey(project)}`, {
        project: project.name,
      });
      return { ...parsed.data, projectId: projectKey(project) };
    }
    return parsed.data;
  }

  async saveProjectState(project: Project, state: ProjectState): Promise<void> {
    const path = this.statePath(project);
    const written = await this.fs.writeFile(path, `${JSON.stringify(state, null, 2)}\n`, {
      createParents: true,
    });
    if (!written.ok) {
      throw new PersistenceError(`Failed to save state for ${project.name}: ${written.error.message}`, {
        cause: written.error.cause,
      });
    }
    this.logger.event('state_saved', `Saved state (${state.conversationHistory.length} turns)`, {
      project: project.name,
      state: state.currentStatus,
    });
  }

  private async readRegistry(): Promise<ProjectsFile> {
    const read = await this.fs.readFile(this.projectsPath);
    if (!read.ok) {
      if (read.error.code === 'NOT_FOUND') {
        return { schemaVersion: '1.0.0', projects: [] };
      }
      throw new PersistenceError(`Failed to read ${this.projectsPath}: ${read.error.message}`, {
        cause: read.error.cause,
      });
    }
    const parsed = parseProjectsFile(read.value);
    if (!parsed.success || !parsed.data) {
      const detail = (parsed.errors ?? ['unknown error']).join('; ');
      throw new PersistenceError(`Invalid project registry ${this.projectsPath}: ${detail}`);
    }
    return parsed.data;
  }

  private async writeRegistry(file: ProjectsFile): Promise<void> {
    const written = await this.fs.writeFile(this.projectsPath, `${JSON.stringify(file, null, 2)}\n`, {
      createParents: true,
    });
    if (!written.ok) {
      throw new PersistenceError(`Failed to write ${this.projectsPath}: ${written.error.message}`, {
        cause: written.error.cause,
      });
    }
  }
}

export function createJsonProjectStore(options: JsonProjectStoreOptions): JsonProjectStore {
  return new JsonProjectStore(options);
}
