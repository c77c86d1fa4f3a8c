import type { ConversationState } from '../models/types';

export interface SessionStoreOptions {
    ttlMinutes: number;
    maxSessions: number;
    now?: () => number;
}

/**
 * Per-user dialogue state.
 *
 * Rules:
 * - First contact creates a fresh state (no option selected)
 * - Every access refreshes lastSeenAt and moves the session to the back of the LRU order
 * - Idle longer than ttlMinutes → dropped (on access or by prune())
 * - Store full → least recently used session evicted
 */
export class SessionStore {
    private sessions: Map<string, ConversationState> = new Map();
    private readonly ttlMs: number;
    private readonly maxSessions: number;
    private readonly now: () => number;

    constructor(options: SessionStoreOptions) {
        this.ttlMs = options.ttlMinutes * 60000;
        this.maxSessions = Math.max(1, options.maxSessions);
        this.now = options.now ?? Date.now;
    }

    get(sessionId: string): ConversationState {
        const now = this.now();
        const existing = this.sessions.get(sessionId);

        if (existing && now - existing.lastSeenAt <= this.ttlMs) {
            // Re-insert to keep Map order = LRU order
            this.sessions.delete(sessionId);
            existing.lastSeenAt = now;
            this.sessions.set(sessionId, existing);
            return existing;
        }

        this.sessions.delete(sessionId);
        this.evictOverflow();

        const fresh: ConversationState = { selectedOption: 'none', lastSeenAt: now };
        this.sessions.set(sessionId, fresh);
        return fresh;
    }

    update(sessionId: string, patch: Partial<Omit<ConversationState, 'lastSeenAt'>>): ConversationState {
        const state = this.get(sessionId);
        Object.assign(state, patch);
        return state;
    }

    reset(sessionId: string): ConversationState {
        return this.update(sessionId, { selectedOption: 'none', lastTokenAddress: undefined });
    }

    /**
     * Drop every idle session. Returns how many were removed.
     */
    prune(): number {
        const now = this.now();
        let removed = 0;

        for (const [sessionId, state] of this.sessions) {
            if (now - state.lastSeenAt > this.ttlMs) {
                this.sessions.delete(sessionId);
                removed++;
            }
        }

        return removed;
    }

    get size(): number {
        return this.sessions.size;
    }

    private evictOverflow() {
        while (this.sessions.size >= this.maxSessions) {
            const oldest = this.sessions.keys().next();
            if (oldest.done) return;
            this.sessions.delete(oldest.value);
        }
    }
}
