// Execution strategies: how the junction schedules producer and upstream pulls

/**
 * Schedules a unit of concurrent work
 */
export interface Strategy {
  readonly name: string;
  execute(task: () => void): void;
}

const defaultStrategy: Strategy = {
  name: 'default',
  execute: (task) => {
    setImmediate(task);
  },
};

const microtaskStrategy: Strategy = {
  name: 'microtask',
  execute: (task) => {
    queueMicrotask(task);
  },
};

const sequentialStrategy: Strategy = {
  name: 'sequential',
  execute: (task) => {
    task();
  },
};

let processDefault: Strategy = defaultStrategy;

export const Strategy = {
  /** Runs each task on its own turn of the event loop (setImmediate) */
  Default: defaultStrategy,

  /** Runs each task on the microtask queue of the current turn */
  Microtask: microtaskStrategy,

  /** Runs each task inline, at the point it is scheduled */
  Sequential: sequentialStrategy,

  /**
   * Strategy used by merges that do not name one
   */
  processDefault: (): Strategy => processDefault,
};

/**
 * Replace the process-wide default strategy. Returns the previous one.
 */
export function setDefaultStrategy(strategy: Strategy): Strategy {
  const previous = processDefault;
  processDefault = strategy;
  return previous;
}
