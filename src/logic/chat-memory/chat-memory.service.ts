import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { SessionTranscript } from './session-transcript';
import { ConversationTurn } from './types';

/**
 * In-process registry of session transcripts. Nothing is persisted: a session
 * lives until it is ended or the process exits.
 */
@Injectable()
export class ChatMemoryService {
  private readonly logger = new Logger(ChatMemoryService.name);
  private readonly sessions = new Map<string, SessionTranscript>();

  ensureSession(sessionId?: string): SessionTranscript {
    if (sessionId) {
      const existing = this.sessions.get(sessionId);
      if (existing) return existing;
    }
    const session = new SessionTranscript(sessionId || uuidv4());
    this.sessions.set(session.id, session);
    return session;
  }

  getSession(sessionId: string): SessionTranscript {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundException(`Session ${sessionId} not found`);
    }
    return session;
  }

  appendTurn(sessionId: string, turn: Omit<ConversationTurn, 'ts'> & { ts?: number }): ConversationTurn {
    const session = this.getSession(sessionId);
    const stored: ConversationTurn = { ...turn, sources: [...turn.sources], ts: turn.ts ?? Date.now() };
    const { repeatedRole } = session.append(stored);
    if (repeatedRole) {
      this.logger.warn(`Session ${sessionId} has two consecutive ${turn.role} turns`);
    }
    return stored;
  }

  getTurns(sessionId: string): readonly ConversationTurn[] {
    return this.getSession(sessionId).turns;
  }

  clearSession(sessionId: string) {
    this.getSession(sessionId).clear();
  }

  endSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }
}
