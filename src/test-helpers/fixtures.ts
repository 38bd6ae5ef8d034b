import { InMemorySkillCatalog } from '../skills/memory.js';
import { loadConfig, type AppConfig } from '../config.js';

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    LOG_LEVEL: 'silent',
    WORKER_EMBEDDED: '0',
    PREVIEW_DELAY_MS: '0',
    ...env,
  });
}

/**
 * alice owns `private-skill` (bob collaborates as viewer) and `empty-skill`
 * (no versions); carol owns `public-skill`.
 */
export function testCatalog(): InMemorySkillCatalog {
  const catalog = new InMemorySkillCatalog();
  const createdAt = new Date('2024-03-01T09:00:00.000Z');

  catalog.addSkill({ id: 'private-skill', ownerId: 'alice', name: 'summarise', description: '', visibility: 'private' });
  catalog.addVersion({ skillId: 'private-skill', version: 1, skillMd: '# Summarise\nShort answers.', createdBy: 'alice', createdAt });
  catalog.addCollaborator({ skillId: 'private-skill', userId: 'bob', role: 'viewer' });

  catalog.addSkill({ id: 'empty-skill', ownerId: 'alice', name: 'draft', description: '', visibility: 'private' });

  catalog.addSkill({ id: 'public-skill', ownerId: 'carol', name: 'translate', description: '', visibility: 'public' });
  catalog.addVersion({ skillId: 'public-skill', version: 3, skillMd: '# Translate', createdBy: 'carol', createdAt });

  return catalog;
}
