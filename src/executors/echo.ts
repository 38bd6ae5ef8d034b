import type { Executor } from './base.js';

export class EchoExecutor implements Executor {
  async run(_skillRef: string, inputText: string): Promise<string> {
    return `echo: ${inputText}`;
  }
}
