import { TaskStore, resolveDataDir } from '@tinytask/core';

/** What every command needs: where the data lives and the store over it */
export interface CliContext {
  readonly dataDir: string;
  readonly store: TaskStore;
}

export function createContext(dataDir: string = resolveDataDir()): CliContext {
  return { dataDir, store: new TaskStore(dataDir) };
}
