export interface NodeResult<TStateDiff = unknown> {
    stateDiff: TStateDiff;
    /** Nodes to run in the next super-step. Omitted or empty ends the run. */
    nextTasks?: string[];
}
