import type { ChannelReducer } from '../models/checkpoint';

/**
 * A reducer that overwrites the previous value (standard channel behavior).
 */
export function lastWriteWinsReducer<T>(): ChannelReducer<T> {
    return (_prev: T | undefined, update: T) => update;
}
