import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { InMemorySkillCatalog } from './memory.js';

const SeedSchema = z.object({
  skills: z.array(z.object({
    id: z.string().min(1),
    ownerId: z.string().min(1),
    name: z.string().min(1).max(120),
    description: z.string().default(''),
    visibility: z.enum(['private', 'shared', 'public']).default('private'),
    versions: z.array(z.object({
      version: z.number().int().min(1),
      skillMd: z.string().min(1),
      createdBy: z.string().min(1).optional(),
      createdAt: z.string().datetime().optional(),
    })).default([]),
    collaborators: z.array(z.object({
      userId: z.string().min(1),
      role: z.enum(['editor', 'viewer']),
    })).default([]),
  })),
});

export type SkillSeed = z.input<typeof SeedSchema>;

export function seedSkillCatalog(catalog: InMemorySkillCatalog, seed: unknown): number {
  const { skills } = SeedSchema.parse(seed);

  for (const skill of skills) {
    catalog.addSkill({
      id: skill.id,
      ownerId: skill.ownerId,
      name: skill.name,
      description: skill.description,
      visibility: skill.visibility,
    });
    for (const version of skill.versions) {
      catalog.addVersion({
        skillId: skill.id,
        version: version.version,
        skillMd: version.skillMd,
        createdBy: version.createdBy ?? skill.ownerId,
        createdAt: version.createdAt ? new Date(version.createdAt) : new Date(),
      });
    }
    for (const collaborator of skill.collaborators) {
      catalog.addCollaborator({ skillId: skill.id, ...collaborator });
    }
  }

  return skills.length;
}

export async function loadSkillSeedFile(catalog: InMemorySkillCatalog, path: string): Promise<number> {
  const text = await readFile(path, 'utf8');
  return seedSkillCatalog(catalog, JSON.parse(text));
}
