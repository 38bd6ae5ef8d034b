import { setTimeout as sleep } from 'node:timers/promises';
import { SkillContentNotFoundError } from '../errors.js';
import type { SkillCatalog } from '../skills/base.js';
import type { Executor } from './base.js';

export interface PreviewExecutorOptions {
  /** Simulated run time. */
  delayMs: number;
  maxPreviewChars: number;
}

export const DEFAULT_PREVIEW_OPTIONS: PreviewExecutorOptions = {
  delayMs: 1000,
  maxPreviewChars: 400,
};

/**
 * Placeholder until sandboxed execution exists: reports the input alongside
 * a preview of the skill's latest version.
 */
export class PreviewExecutor implements Executor {
  private options: PreviewExecutorOptions;

  constructor(private catalog: SkillCatalog, options: Partial<PreviewExecutorOptions> = {}) {
    this.options = { ...DEFAULT_PREVIEW_OPTIONS, ...options };
  }

  async run(skillRef: string, inputText: string, signal: AbortSignal): Promise<string> {
    const latest = await this.catalog.latestVersion(skillRef);
    if (!latest) {
      throw new SkillContentNotFoundError(skillRef);
    }

    if (this.options.delayMs > 0) {
      await sleep(this.options.delayMs, undefined, { signal });
    }

    const preview = latest.skillMd.slice(0, this.options.maxPreviewChars).replace(/\n/g, ' ');
    return [
      'Simulated run output.',
      '',
      `User input: ${inputText}`,
      `Skill version: v${latest.version}`,
      `Skill preview: ${preview}`,
    ].join('\n');
  }
}
