/**
 * Turns a skill and an input into output text. A rejected promise is an
 * ordinary outcome: the worker records it on the job as `failed`.
 *
 * Implementations may read skill content but must never write to the job store.
 */
export interface Executor {
  run(skillRef: string, inputText: string, signal: AbortSignal): Promise<string>;
}

export type ExecutorKind = 'preview' | 'echo';
