import {
    accumulateStats,
    emptySessionStats,
    type Interaction,
    type NewInteraction,
    type SessionStats,
    type SessionStore
} from '@newsroute/core';

function copy(interaction: Interaction): Interaction {
    return { ...interaction, timestamp: new Date(interaction.timestamp), metadata: { ...interaction.metadata } };
}

/**
 * Process-local store. Interactions vanish with the process; use it for
 * tests and throwaway setups.
 */
export class InMemorySessionStore implements SessionStore {
    private readonly sessions = new Map<string, Interaction[]>();
    private sequence = 0;

    public async start(): Promise<void> { }

    public async close(): Promise<void> {
        this.sessions.clear();
    }

    public async saveInteraction(input: NewInteraction): Promise<Interaction> {
        this.sequence += 1;
        const interaction: Interaction = {
            id: String(this.sequence),
            timestamp: input.timestamp ?? new Date(),
            sessionId: input.sessionId,
            query: input.query,
            category: input.category,
            response: input.response,
            metadata: { ...input.metadata }
        };

        const bucket = this.sessions.get(input.sessionId) ?? [];
        bucket.push(interaction);
        this.sessions.set(input.sessionId, bucket);
        return copy(interaction);
    }

    public async getHistory(sessionId: string, limit: number): Promise<Interaction[]> {
        if (limit <= 0) return [];
        const bucket = this.sessions.get(sessionId) ?? [];
        return [...bucket]
            .sort((a, b) => (b.timestamp.getTime() - a.timestamp.getTime()) || (Number(b.id) - Number(a.id)))
            .slice(0, limit)
            .map(copy);
    }

    public async clear(sessionId: string): Promise<number> {
        const removed = this.sessions.get(sessionId)?.length ?? 0;
        this.sessions.delete(sessionId);
        return removed;
    }

    public async stats(sessionId: string): Promise<SessionStats> {
        const bucket = this.sessions.get(sessionId) ?? [];
        return bucket.reduce(accumulateStats, emptySessionStats(sessionId));
    }
}
