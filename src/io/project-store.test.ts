import { describe, it, expect, beforeEach } from 'vitest';
import { JsonProjectStore } from './project-store';
import { MemoryFileSystem } from './memory-file-system';
import { createBufferLogger } from '../logging/buffer-logger';
import { PersistenceError, ValidationError } from '../types/errors';
import { createInitialProjectState } from '../types/project';
import type { Project, ProjectState } from '../types/project';

describe('JsonProjectStore', () => {
  let fs: MemoryFileSystem;
  let store: JsonProjectStore;
  let nextId: number;

  beforeEach(() => {
    fs = new MemoryFileSystem();
    fs.seedFile('/work/app/README.md', '# app');
    nextId = 0;
    store = new JsonProjectStore({
      fileSystem: fs,
      dataDirectory: '/data',
      stateDirName: '.handoff',
      logger: createBufferLogger(),
      generateId: () => `id-${++nextId}`,
    });
  });

  describe('projects', () => {
    it('should start with no projects', async () => {
      expect(await store.loadProjects()).toEqual([]);
    });

    it('should add a project with a generated id', async () => {
      const project = await store.addProject({
        name: ' demo ',
        workspaceRootPath: '/work/app',
        overallGoal: 'Ship the login page',
      });

      expect(project).toEqual({
        name: 'demo',
        workspaceRootPath: '/work/app',
        overallGoal: 'Ship the login page',
        id: 'id-1',
      });
      expect(await store.getProjectByName('demo')).toEqual(project);
      expect(await store.getProjectById('id-1')).toEqual(project);

      const saved: unknown = JSON.parse(fs.peek('/data/projects.json') ?? '{}');
      expect(saved).toEqual({ schemaVersion: '1.0.0', projects: [project] });
    });

    it('should reject a duplicate name', async () => {
      await store.addProject({ name: 'demo', workspaceRootPath: '/work/app', overallGoal: 'Goal' });
      await expect(
        store.addProject({ name: 'demo', workspaceRootPath: '/work/app', overallGoal: 'Other goal' })
      ).rejects.toThrow('A project named "demo" already exists');
    });

    it('should reject a relative or missing workspace', async () => {
      await expect(
        store.addProject({ name: 'a', workspaceRootPath: 'work/app', overallGoal: 'Goal' })
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        store.addProject({ name: 'b', workspaceRootPath: '/nowhere', overallGoal: 'Goal' })
      ).rejects.toThrow('Workspace path is not an existing directory: /nowhere');
    });

    it('should reject an empty goal', async () => {
      await expect(
        store.addProject({ name: 'demo', workspaceRootPath: '/work/app', overallGoal: '  ' })
      ).rejects.toThrow('Overall goal cannot be empty');
    });

    it('should backfill missing ids and save them', async () => {
      fs.seedFile(
        '/data/projects.json',
        JSON.stringify({
          schemaVersion: '1.0.0',
          projects: [{ name: 'legacy', workspaceRootPath: '/work/app', overallGoal: 'Goal' }],
        })
      );

      const projects = await store.loadProjects();

      expect(projects).toEqual([{ name: 'legacy', workspaceRootPath: '/work/app', overallGoal: 'Goal', id: 'id-1' }]);
      expect(await store.loadProjects()).toEqual(projects);
      expect(nextId).toBe(1);
    });

    it('should refuse an invalid registry', async () => {
      fs.seedFile('/data/projects.json', '{"schemaVersion":"1.0.0","projects":[{"name":""}]}');
      await expect(store.loadProjects()).rejects.toBeInstanceOf(PersistenceError);
    });
  });

  describe('project state', () => {
    const project: Project = { name: 'demo', workspaceRootPath: '/work/app', overallGoal: 'Goal', id: 'p-1' };

    it('should return null when nothing is saved', async () => {
      expect(await store.loadProjectState(project)).toBeNull();
    });

    it('should round-trip state with its turns in order', async () => {
      const state: ProjectState = {
        ...createInitialProjectState('p-1'),
        currentStatus: 'PAUSED_WAITING_USER_INPUT',
        pendingUserQuestion: 'which file?',
        conversationHistory: [
          { sender: 'user', message: 'do X', timestamp: '2025-01-01T00:00:00.000Z' },
          { sender: 'manager_clarification_request', message: 'which file?', timestamp: '2025-01-01T00:00:01.000Z' },
          { sender: 'system', message: 'note', timestamp: '2025-01-01T00:00:02.000Z', metadata: { source: 'test' } },
        ],
      };

      await store.saveProjectState(project, state);

      expect(fs.peek('/work/app/.handoff/state.json')).toBeDefined();
      expect(await store.loadProjectState(project)).toEqual(state);
    });

    it('should reject an unknown saved status', async () => {
      fs.seedFile(
        '/work/app/.handoff/state.json',
        JSON.stringify({ ...createInitialProjectState('p-1'), currentStatus: 'RUNNING_PROCESSING_LOG' })
      );
      await expect(store.loadProjectState(project)).rejects.toThrow(/Invalid saved state for demo/);
    });

    it('should rebind state saved under another key', async () => {
      fs.seedFile('/work/app/.handoff/state.json', JSON.stringify(createInitialProjectState('demo')));
      const loaded = await store.loadProjectState(project);
      expect(loaded?.projectId).toBe('p-1');
    });

    it('should raise PersistenceError when the state cannot be read', async () => {
      fs.seedFile('/work/app/.handoff/state.json', '{}');
      fs.failNext('readFile', 'PERMISSION_DENIED', 'state.json');
      await expect(store.loadProjectState(project)).rejects.toBeInstanceOf(PersistenceError);
    });

    it('should raise PersistenceError when the state cannot be saved', async () => {
      fs.failNext('writeFile', 'IO_ERROR', 'state.json');
      await expect(store.saveProjectState(project, createInitialProjectState('p-1'))).rejects.toThrow(
        'Failed to save state for demo: Injected IO_ERROR on writeFile'
      );
    });
  });
});
