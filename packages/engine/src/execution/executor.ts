import { randomUUID } from 'node:crypto';
import type { CheckpointSaver, Logger, NodeResult, StateSnapshot } from '@newsroute/core';
import type { ChannelReducer } from '../models/checkpoint';

export type ChannelMap<TState> = { [K in keyof TState]: ChannelReducer<TState[K]> };

export type GraphNodeHandler<TState, TContext> =
    (context: TContext & { state: Readonly<TState> }) => Promise<NodeResult<Partial<TState>>>;

/**
 * Defines the structure and reducer behavior of the execution graph.
 */
export interface EngineGraphSpec<TState extends object, TContext extends object> {
    /** Map of state channels to their respective reducers. */
    channels: ChannelMap<TState>;

    /** Map of node names to their execution handlers. */
    nodes: Record<string, GraphNodeHandler<TState, TContext>>;
}

export interface EngineExecutorConfig<TState> {
    threadId: string;
    saver: CheckpointSaver<TState>;
    entrypoint: string;
    logger?: Logger | undefined;
    /** Guard against cycles. */
    maxSteps?: number;
}

const DEFAULT_MAX_STEPS = 25;

function applyWrite<TState, K extends keyof TState>(
    channels: ChannelMap<TState>,
    target: TState,
    current: TState,
    writes: Partial<TState>,
    key: K
): void {
    const update: TState[K] | undefined = writes[key];
    if (update === undefined) return;
    const reducer = channels[key];
    target[key] = reducer ? reducer(current[key], update) : update;
}

function isWrittenKey<TState>(writes: Partial<TState>, key: PropertyKey): key is keyof TState {
    return Object.prototype.hasOwnProperty.call(writes, key);
}

export class EngineExecutor<TState extends object, TContext extends object> {
    constructor(private readonly graph: EngineGraphSpec<TState, TContext>) { }

    /**
     * Runs the graph from `entrypoint` until no node schedules further tasks.
     * Nodes scheduled in the same super-step run concurrently against a frozen
     * snapshot; their writes are committed together at the step barrier.
     */
    public async invoke(
        input: TState,
        context: TContext,
        config: EngineExecutorConfig<TState>
    ): Promise<StateSnapshot<TState>> {
        const { threadId, saver } = config;
        const maxSteps = config.maxSteps ?? DEFAULT_MAX_STEPS;
        const logger = config.logger?.child({ threadId });

        if (!this.graph.nodes[config.entrypoint]) {
            throw new Error(`Graph Execution Error: entrypoint ${config.entrypoint} not found.`);
        }

        let current: StateSnapshot<TState> = {
            checkpointId: randomUUID(),
            values: input,
            metadata: { step: 0, source: 'input', writes: {} },
            createdAt: new Date(),
            nextTasks: [config.entrypoint]
        };
        await saver.putCheckpoint(threadId, current);

        let loopCount = 0;
        while (current.nextTasks.length > 0) {
            if (++loopCount > maxSteps) {
                throw new Error(`Graph Execution Error: Max steps (${maxSteps}) exceeded for thread ${threadId}`);
            }

            const tasks = [...current.nextTasks];
            const snapshotContext = { ...context, state: Object.freeze({ ...current.values }) };
            logger?.trace({ step: loopCount, tasks }, 'Executing super-step');

            const results = await Promise.all(
                tasks.map(async (taskName) => {
                    const handler = this.graph.nodes[taskName];
                    if (!handler) {
                        throw new Error(`Graph Execution Error: Node ${taskName} not found.`);
                    }
                    const result = await handler(snapshotContext);
                    logger?.trace({ node: taskName }, 'Node completed');
                    return result;
                })
            );

            const writes: Partial<TState> = {};
            const nextTasks: string[] = [];
            for (const result of results) {
                Object.assign(writes, result.stateDiff);
                for (const task of result.nextTasks ?? []) {
                    if (!nextTasks.includes(task)) nextTasks.push(task);
                }
            }

            const next: StateSnapshot<TState> = {
                checkpointId: randomUUID(),
                parentCheckpointId: current.checkpointId,
                values: this.applyReducers(current.values, writes),
                metadata: { step: current.metadata.step + 1, source: 'loop', writes },
                createdAt: new Date(),
                nextTasks
            };
            await saver.putCheckpoint(threadId, next);
            current = next;
        }

        logger?.debug({ steps: loopCount }, 'Graph execution complete');
        return current;
    }

    private applyReducers(current: TState, writes: Partial<TState>): TState {
        const next = { ...current };
        for (const key of Object.keys(writes)) {
            if (isWrittenKey(writes, key)) {
                applyWrite(this.graph.channels, next, current, writes, key);
            }
        }
        return next;
    }
}
