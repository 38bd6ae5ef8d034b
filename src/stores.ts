import type { AppConfig } from './config.js';
import { InMemoryJobRepository, PostgresJobRepository, createPool, poolClient, type JobRepository } from './repositories/index.js';
import { InMemorySkillCatalog, PostgresSkillCatalog, loadSkillSeedFile, type SkillCatalog } from './skills/index.js';

export interface Stores {
  kind: AppConfig['repo']['kind'];
  repo: JobRepository;
  catalog: SkillCatalog;
  close(): Promise<void>;
}

export async function createStores(config: Pick<AppConfig, 'repo' | 'skills'>): Promise<Stores> {
  switch (config.repo.kind) {
    case 'memory': {
      const catalog = new InMemorySkillCatalog();
      if (config.skills.seedFile) {
        await loadSkillSeedFile(catalog, config.skills.seedFile);
      }
      return {
        kind: 'memory',
        repo: new InMemoryJobRepository(),
        catalog,
        close: async () => {},
      };
    }

    case 'postgres': {
      if (!config.repo.databaseUrl) {
        throw new Error('DATABASE_URL must be set when REPO_KIND=postgres');
      }
      const pool = createPool(config.repo.databaseUrl);
      const client = poolClient(pool);
      const repo = new PostgresJobRepository(client);
      if (config.repo.migrate) {
        await repo.migrate();
      }
      return {
        kind: 'postgres',
        repo,
        catalog: new PostgresSkillCatalog(client),
        close: () => pool.end(),
      };
    }
  }
}
