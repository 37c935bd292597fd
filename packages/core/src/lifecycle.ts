/**
 * Anything the runtime owns for the lifetime of an assistant: database
 * handles, HTTP clients with keep-alive agents, etc.
 */
export interface RuntimeResource {
  start?(): Promise<void>;
  close?(): Promise<void>;
}
