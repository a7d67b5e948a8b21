import { randomUUID } from 'crypto';
import { CFG } from '../config';
import { DEFAULT_PROJECT_DETAILS, ProjectDetails, parseProjectDetails } from '../schemas/project';
import type { Session } from '../types';
import { MemoryWindow } from './memory';

export interface CreateSessionOptions {
  sessionId?: string;
  projectDetails?: ProjectDetails;
  memoryWindow?: number;
}

export function createSession(options: CreateSessionOptions = {}): Session {
  const details = options.projectDetails ?? DEFAULT_PROJECT_DETAILS;
  return {
    id: options.sessionId ?? randomUUID(),
    projectDetails: { ...details, team_skills: [...details.team_skills] },
    memory: new MemoryWindow(options.memoryWindow ?? CFG.MEMORY_WINDOW),
    messages: [],
    debug: {},
    createdAt: Date.now(),
    pending: Promise.resolve()
  };
}

/**
 * In-memory registry of advisor sessions. Sessions share nothing; each owns
 * its project details, memory window and display log.
 */
export class SessionManager {
  private sessions: Map<string, Session> = new Map();

  constructor(private readonly memoryWindow: number = CFG.MEMORY_WINDOW) {}

  createSession(sessionId?: string, projectDetails?: ProjectDetails): Session {
    if (sessionId && this.sessions.has(sessionId)) {
      throw new Error(`Session ${sessionId} already exists`);
    }
    const session = createSession({ sessionId, projectDetails, memoryWindow: this.memoryWindow });
    this.sessions.set(session.id, session);
    console.log(`[SessionManager] Created session: ${session.id}`);
    return session;
  }

  getSession(sessionId: string): Session | null {
    return this.sessions.get(sessionId) || null;
  }

  getOrCreateSession(sessionId: string): Session {
    return this.getSession(sessionId) ?? this.createSession(sessionId);
  }

  getAllSessions(): Session[] {
    return Array.from(this.sessions.values());
  }

  /** Replaces the project snapshot after validating the merged result. */
  updateProjectDetails(sessionId: string, patch: Partial<Record<keyof ProjectDetails, unknown>>): ProjectDetails {
    const session = this.requireSession(sessionId);
    session.projectDetails = parseProjectDetails({ ...session.projectDetails, ...patch });
    return session.projectDetails;
  }

  /** Empties the memory window; project details and display log are kept. */
  clearHistory(sessionId: string): void {
    const session = this.requireSession(sessionId);
    session.memory.clear();
    console.log(`[SessionManager] Cleared conversation history for session ${sessionId}`);
  }

  deleteSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private requireSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session ${sessionId} not found`);
    }
    return session;
  }
}
