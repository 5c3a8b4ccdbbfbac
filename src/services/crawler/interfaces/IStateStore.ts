import { FrontierState } from './types';

/**
 * Interface for durable frontier state.
 * Implementations must return an empty state when nothing has been saved yet.
 */
export interface IStateStore {
  load(): Promise<FrontierState>;
  save(state: FrontierState): Promise<void>;
}
