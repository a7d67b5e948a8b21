import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DEFAULT_PROJECT_DETAILS, ProjectDetailsError } from '../schemas/project';
import { SessionManager } from './sessionManager';

describe('SessionManager', () => {
  let manager: SessionManager;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    manager = new SessionManager(3);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates sessions with default details and the configured window', () => {
    const session = manager.createSession('s1');
    expect(session.id).toBe('s1');
    expect(session.projectDetails).toEqual(DEFAULT_PROJECT_DETAILS);
    expect(session.memory.capacity).toBe(3);
    expect(session.messages).toEqual([]);
    expect(manager.getSession('s1')).toBe(session);
  });

  it('generates an id when none is given', () => {
    const session = manager.createSession();
    expect(session.id.length).toBeGreaterThan(0);
    expect(manager.getAllSessions()).toEqual([session]);
  });

  it('rejects duplicate session ids', () => {
    manager.createSession('s1');
    expect(() => manager.createSession('s1')).toThrow('Session s1 already exists');
  });

  it('reuses an existing session in getOrCreateSession', () => {
    const session = manager.createSession('s1');
    expect(manager.getOrCreateSession('s1')).toBe(session);
    expect(manager.getOrCreateSession('s2').id).toBe('s2');
  });

  it('does not share project details between sessions', () => {
    const a = manager.createSession('a');
    const b = manager.createSession('b');
    manager.updateProjectDetails('a', { team_skills: ['Go'] });
    expect(a.projectDetails.team_skills).toEqual(['Go']);
    expect(b.projectDetails.team_skills).toEqual([]);
    expect(DEFAULT_PROJECT_DETAILS.team_skills).toEqual([]);
  });

  it('validates project detail updates', () => {
    manager.createSession('s1');
    expect(manager.updateProjectDetails('s1', { budget: 'Low', team_skills: ['Python', 'Python'] })).toMatchObject({
      budget: 'Low',
      team_skills: ['Python']
    });
    expect(() => manager.updateProjectDetails('s1', { budget: 'Huge' })).toThrow(ProjectDetailsError);
    expect(manager.getSession('s1')?.projectDetails.budget).toBe('Low');
  });

  it('clears history but keeps project details and the display log', () => {
    const session = manager.createSession('s1');
    manager.updateProjectDetails('s1', { project_description: 'shop' });
    session.memory.append({ input: 'q', output: { kind: 'fallback', rawText: 'a', details: 'd' }, timestamp: 1 });
    session.messages.push({ role: 'user', content: 'q' });

    manager.clearHistory('s1');

    expect(session.memory.size).toBe(0);
    expect(session.projectDetails.project_description).toBe('shop');
    expect(session.messages).toHaveLength(1);
  });

  it('throws for unknown sessions', () => {
    expect(() => manager.clearHistory('missing')).toThrow('Session missing not found');
    expect(manager.getSession('missing')).toBeNull();
  });

  it('deletes sessions', () => {
    manager.createSession('s1');
    expect(manager.deleteSession('s1')).toBe(true);
    expect(manager.getSession('s1')).toBeNull();
  });
});
