/**
 * Session Manager Service
 *
 * Keeps per-conversation context in memory for one chatbot.
 *
 * Key responsibilities:
 * - Create a session on the first message of a conversation
 * - Record every decision and track pending clarifications
 * - Turn a clarification follow-up into an answer
 * - Give up on a clarification nobody resolves (so conversations can't get stuck)
 * - Expire idle sessions and drop them
 *
 * Sessions go active → expired → removed. Something outside this class
 * has to call sweep() (or startExpiryTimer()) for time to pass.
 */

import { v4 as uuidv4 } from 'uuid';
import { MatchDecision, ScoredCandidate, SessionState } from '../../shared/types';

/**
 * Configuration options for the SessionManager.
 */
export interface SessionManagerConfig {
    /** Follow-ups allowed to go unresolved before a clarification is dropped */
    maxClarificationTurns: number;
    /** Idle time after which a session expires */
    idleTimeoutMs: number;
}

export const DEFAULT_SESSION_CONFIG: SessionManagerConfig = {
    maxClarificationTurns: 1,
    idleTimeoutMs: 30 * 60 * 1000,
};

/**
 * Source of "now". Tests pass a fake clock.
 */
export type Clock = () => Date;

export interface ISessionManager {
    getOrCreate(conversationId?: string): SessionState;
    getSession(conversationId: string): SessionState | null;
    recordTurn(conversationId: string, decision: MatchDecision): SessionState;
    resolveClarification(conversationId: string, entryId: string): MatchDecision | null;
    recordUnresolvedFollowUp(conversationId: string): MatchDecision | null;
    recordReoffer(conversationId: string, decision: MatchDecision): SessionState;
    end(conversationId: string): boolean;
}

export class SessionManager implements ISessionManager {
    private readonly sessions = new Map<string, SessionState>();
    private readonly config: SessionManagerConfig;
    private readonly now: Clock;
    private timer: NodeJS.Timeout | null = null;

    constructor(config: Partial<SessionManagerConfig> = {}, clock: Clock = () => new Date()) {
        this.config = { ...DEFAULT_SESSION_CONFIG, ...config };
        this.now = clock;
    }

    /**
     * Returns the active session for a conversation, creating it if needed.
     *
     * An expired session that hasn't been swept yet is replaced by a fresh
     * one under the same id.
     *
     * @param conversationId - Omit to start a new conversation with a generated id
     */
    getOrCreate(conversationId?: string): SessionState {
        const id = conversationId ?? uuidv4();
        const existing = this.sessions.get(id);
        if (existing && existing.status === 'active') {
            return existing;
        }

        const now = this.now();
        const session: SessionState = {
            conversationId: id,
            status: 'active',
            unresolvedTurns: 0,
            turnCount: 0,
            history: [],
            createdAt: now,
            lastActiveAt: now,
        };
        this.sessions.set(id, session);
        return session;
    }

    /**
     * Retrieves a session by id, or null if it doesn't exist.
     */
    getSession(conversationId: string): SessionState | null {
        return this.sessions.get(conversationId) ?? null;
    }

    /**
     * Appends a decision to the conversation.
     *
     * A clarify decision opens a pending clarification; any other decision
     * closes whatever was pending.
     */
    recordTurn(conversationId: string, decision: MatchDecision): SessionState {
        const session = this.getOrCreate(conversationId);

        session.history.push(decision);
        session.lastDecision = decision;
        session.turnCount += 1;
        session.unresolvedTurns = 0;
        session.lastActiveAt = this.now();

        if (decision.kind === 'clarify') {
            session.pendingClarification = decision.candidates.map((c) => ({ ...c }));
        } else {
            delete session.pendingClarification;
        }

        return session;
    }

    /**
     * Candidates the user was last asked to choose from, or null.
     */
    getPendingClarification(conversationId: string): ScoredCandidate[] | null {
        const session = this.sessions.get(conversationId);
        if (!session || session.status !== 'active' || !session.pendingClarification) {
            return null;
        }
        return session.pendingClarification.map((c) => ({ ...c }));
    }

    /**
     * Converts the user's choice into an answered decision.
     *
     * @param entryId - The FAQ the user picked; must be one of the pending candidates
     * @returns The recorded answered decision, or null if nothing is pending
     *          or the entry wasn't offered
     */
    resolveClarification(conversationId: string, entryId: string): MatchDecision | null {
        const pending = this.getPendingClarification(conversationId);
        const chosen = pending?.find((c) => c.entryId === entryId);
        if (!chosen) {
            return null;
        }

        const decision: MatchDecision = {
            kind: 'answered',
            entryId: chosen.entryId,
            score: chosen.score,
        };
        this.recordTurn(conversationId, decision);
        return decision;
    }

    /**
     * Notes a follow-up that didn't pick any pending candidate.
     *
     * @returns A no_match decision once the clarification has gone unresolved
     *          for maxClarificationTurns follow-ups (pending state is cleared);
     *          null while the clarification is still open
     */
    recordUnresolvedFollowUp(conversationId: string): MatchDecision | null {
        const session = this.sessions.get(conversationId);
        if (!session || session.status !== 'active' || !session.pendingClarification) {
            return null;
        }

        session.unresolvedTurns += 1;
        session.lastActiveAt = this.now();

        if (session.unresolvedTurns < this.config.maxClarificationTurns) {
            return null;
        }

        const decision: MatchDecision = { kind: 'no_match', reason: 'unresolved_clarification' };
        this.recordTurn(conversationId, decision);
        return decision;
    }

    /**
     * Appends a decision that repeats the pending clarification.
     *
     * Unlike recordTurn(), the pending candidates and the unresolved
     * follow-up count are left as they are.
     */
    recordReoffer(conversationId: string, decision: MatchDecision): SessionState {
        const session = this.getOrCreate(conversationId);

        session.history.push(decision);
        session.lastDecision = decision;
        session.turnCount += 1;
        session.lastActiveAt = this.now();

        return session;
    }

    /**
     * Discards a conversation.
     *
     * @returns true if the conversation existed
     */
    end(conversationId: string): boolean {
        return this.sessions.delete(conversationId);
    }

    /**
     * Marks sessions idle for longer than idleTimeoutMs as expired.
     *
     * @returns Ids of the sessions that expired on this call
     */
    expireIdle(now: Date = this.now()): string[] {
        const expired: string[] = [];
        for (const session of this.sessions.values()) {
            if (
                session.status === 'active' &&
                now.getTime() - session.lastActiveAt.getTime() >= this.config.idleTimeoutMs
            ) {
                session.status = 'expired';
                delete session.pendingClarification;
                expired.push(session.conversationId);
            }
        }
        return expired;
    }

    /**
     * Drops expired sessions.
     *
     * @returns Number of sessions removed
     */
    purgeExpired(): number {
        let count = 0;
        for (const [id, session] of this.sessions) {
            if (session.status === 'expired') {
                this.sessions.delete(id);
                count++;
            }
        }
        return count;
    }

    /**
     * Expire then purge in one pass.
     */
    sweep(now: Date = this.now()): number {
        this.expireIdle(now);
        return this.purgeExpired();
    }

    /**
     * Runs sweep() on an interval. The timer doesn't keep the process alive.
     */
    startExpiryTimer(intervalMs: number = Math.min(this.config.idleTimeoutMs, 60000)): void {
        this.stop();
        this.timer = setInterval(() => this.sweep(), intervalMs);
        this.timer.unref();
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    size(): number {
        return this.sessions.size;
    }

    getConfig(): SessionManagerConfig {
        return { ...this.config };
    }
}

/**
 * Factory function to create a SessionManager instance.
 *
 * @param config - Optional configuration
 * @param clock - Optional clock, for tests
 */
export function createSessionManager(
    config?: Partial<SessionManagerConfig>,
    clock?: Clock
): SessionManager {
    return new SessionManager(config, clock);
}
