import type { CheckpointSaver, StateSnapshot } from '@newsroute/core';

/**
 * A reducer defines how a specific channel merges new writes into its current state.
 */
export type ChannelReducer<T> = (current: T | undefined, update: T) => T;

/**
 * An in-memory checkpoint saver for short-lived graph executions, such as a
 * single query run. Nothing outlives the saver instance.
 */
export class TransientCheckpointSaver<TState = Record<string, unknown>> implements CheckpointSaver<TState> {
    protected readonly checkpoints = new Map<string, StateSnapshot<TState>[]>();

    public async putCheckpoint(threadId: string, snapshot: StateSnapshot<TState>): Promise<void> {
        const history = this.checkpoints.get(threadId) ?? [];
        history.push(snapshot);
        this.checkpoints.set(threadId, history);
    }

    public async getCheckpoint(threadId: string): Promise<StateSnapshot<TState> | null> {
        const history = this.checkpoints.get(threadId) ?? [];
        return history[history.length - 1] ?? null;
    }

    public async getCheckpointHistory(threadId: string): Promise<StateSnapshot<TState>[]> {
        return this.checkpoints.get(threadId) ?? [];
    }
}
