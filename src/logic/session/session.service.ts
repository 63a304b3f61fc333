import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Interval } from '@nestjs/schedule';
import { v4 as uuidv4 } from 'uuid';
import { AppEnv } from '../../utils/env';
import { ChatMode, Notice, SessionState } from '../../utils/types';

const MINUTE_MS = 60_000;

@Injectable()
export class SessionService {
    private readonly logger = new Logger(SessionService.name);
    private readonly sessions = new Map<string, SessionState>();
    private readonly timeoutMinutes: number;
    private readonly retentionMinutes: number;

    constructor(configService: ConfigService<AppEnv, true>) {
        this.timeoutMinutes = configService.get('SESSION_TIMEOUT_MINUTES', { infer: true });
        this.retentionMinutes = configService.get('SESSION_RETENTION_MINUTES', { infer: true });
    }

    /** Unknown or missing ids get a fresh session under a server-issued id. */
    ensureSession(sessionId?: string): SessionState {
        if (sessionId) {
            const existing = this.sessions.get(sessionId);
            if (existing) return existing;
        }
        const now = Date.now();
        const session: SessionState = {
            id: uuidv4(),
            mode: ChatMode.GENERAL,
            messages: [],
            inputVersion: 0,
            lastActivity: now,
            createdAt: now,
        };
        this.sessions.set(session.id, session);
        return session;
    }

    resetSession(session: SessionState, now = Date.now()) {
        session.mode = ChatMode.GENERAL;
        session.messages = [];
        session.inputVersion += 1;
        session.lastActivity = now;
    }

    touch(session: SessionState, now = Date.now()) {
        session.lastActivity = now;
    }

    /**
     * Checked at the start of every request. Past the inactivity window the
     * session is reset and the caller should drop the action it was about to run.
     */
    expireIfIdle(session: SessionState, now = Date.now()): Notice | null {
        const idleMs = now - session.lastActivity;
        if (idleMs <= this.timeoutMinutes * MINUTE_MS) {
            return null;
        }
        this.resetSession(session, now);
        this.logger.log(`Session ${session.id} expired after ${Math.floor(idleMs / MINUTE_MS)} idle minutes`);
        return {
            level: 'warning',
            text: `⏳ Session expired due to ${this.timeoutMinutes} minutes of inactivity. Starting a new chat.`,
        };
    }

    @Interval(MINUTE_MS)
    pruneAbandonedSessions(now = Date.now()): number {
        const cutoff = now - this.retentionMinutes * MINUTE_MS;
        let pruned = 0;
        for (const [id, session] of this.sessions) {
            if (session.lastActivity < cutoff) {
                this.sessions.delete(id);
                pruned++;
            }
        }
        if (pruned > 0) {
            this.logger.log(`Pruned ${pruned} abandoned sessions, ${this.sessions.size} remain`);
        }
        return pruned;
    }
}
