import { describe, expect, it } from 'vitest';
import {
    EngineExecutor,
    TransientCheckpointSaver,
    lastWriteWinsReducer,
    type ChannelReducer
} from '../src/index';

interface TestState {
    trail?: string[];
    value?: number;
}

const appendTrail: ChannelReducer<string[] | undefined> = (prev, update) => [...(prev ?? []), ...(update ?? [])];

describe('EngineExecutor', () => {
    it('runs nodes in the order they schedule each other and commits writes', async () => {
        const executor = new EngineExecutor<TestState, { factor: number }>({
            channels: {
                trail: appendTrail,
                value: lastWriteWinsReducer<number | undefined>()
            },
            nodes: {
                start: async () => ({ stateDiff: { trail: ['start'], value: 1 }, nextTasks: ['double'] }),
                double: async (ctx) => ({
                    stateDiff: { trail: ['double'], value: (ctx.state.value ?? 0) * ctx.factor },
                    nextTasks: []
                })
            }
        });

        const saver = new TransientCheckpointSaver<TestState>();
        const result = await executor.invoke({}, { factor: 3 }, { threadId: 't1', saver, entrypoint: 'start' });

        expect(result.values).toEqual({ trail: ['start', 'double'], value: 3 });
        expect(result.nextTasks).toEqual([]);
        expect(result.metadata.step).toBe(2);

        const history = await saver.getCheckpointHistory('t1');
        expect(history).toHaveLength(3);
        expect(history[1]?.parentCheckpointId).toBe(history[0]?.checkpointId);
    });

    it('exposes a frozen snapshot of state to nodes', async () => {
        const executor = new EngineExecutor<TestState, object>({
            channels: { trail: appendTrail },
            nodes: {
                start: async (ctx) => ({ stateDiff: { trail: [Object.isFrozen(ctx.state) ? 'frozen' : 'mutable'] } })
            }
        });

        const result = await executor.invoke({}, {}, {
            threadId: 't2',
            saver: new TransientCheckpointSaver<TestState>(),
            entrypoint: 'start'
        });

        expect(result.values.trail).toEqual(['frozen']);
    });

    it('rejects unknown entrypoints and scheduled nodes', async () => {
        const executor = new EngineExecutor<TestState, object>({
            channels: {},
            nodes: {
                start: async () => ({ stateDiff: {}, nextTasks: ['missing'] })
            }
        });
        const saver = new TransientCheckpointSaver<TestState>();

        await expect(executor.invoke({}, {}, { threadId: 't3', saver, entrypoint: 'nope' }))
            .rejects.toThrow('entrypoint nope not found');
        await expect(executor.invoke({}, {}, { threadId: 't4', saver, entrypoint: 'start' }))
            .rejects.toThrow('Node missing not found');
    });

    it('stops cyclic graphs after the step limit', async () => {
        const executor = new EngineExecutor<TestState, object>({
            channels: {},
            nodes: {
                loop: async () => ({ stateDiff: {}, nextTasks: ['loop'] })
            }
        });

        await expect(executor.invoke({}, {}, {
            threadId: 't5',
            saver: new TransientCheckpointSaver<TestState>(),
            entrypoint: 'loop',
            maxSteps: 4
        })).rejects.toThrow('Max steps (4) exceeded for thread t5');
    });
});
