/**
 * Persistence collaborator contract
 */

import type { Project, ProjectState } from './project';

export interface NewProjectInput {
  name: string;
  workspaceRootPath: string;
  overallGoal: string;
}

export interface ProjectStore {
  loadProjects(): Promise<Project[]>;

  /**
   * Register a project. Throws ValidationError for a duplicate name,
   * a missing or relative workspace, or an empty goal.
   */
  addProject(input: NewProjectInput): Promise<Project>;

  getProjectByName(name: string): Promise<Project | undefined>;
  getProjectById(id: string): Promise<Project | undefined>;

  /**
   * Load saved state; null when the project has none yet.
   * Throws PersistenceError on unreadable or invalid state.
   */
  loadProjectState(project: Project): Promise<ProjectState | null>;

  /**
   * Throws PersistenceError on failure
   */
  saveProjectState(project: Project, state: ProjectState): Promise<void>;
}
