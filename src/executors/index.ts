import type { SkillCatalog } from '../skills/base.js';
import type { Executor, ExecutorKind } from './base.js';
import { EchoExecutor } from './echo.js';
import { PreviewExecutor, type PreviewExecutorOptions } from './preview.js';

export * from './base.js';
export * from './echo.js';
export * from './preview.js';

export interface ExecutorDeps {
  catalog: SkillCatalog;
  preview?: Partial<PreviewExecutorOptions>;
}

export function createExecutor(kind: ExecutorKind, deps: ExecutorDeps): Executor {
  switch (kind) {
    case 'preview':
      return new PreviewExecutor(deps.catalog, deps.preview);

    case 'echo':
      return new EchoExecutor();
  }
}
