import { z } from 'zod';
import type { SqlClient } from '../repositories/sql.js';
import type { Skill, SkillVersion } from '../types/skill.js';
import type { SkillCatalog } from './base.js';

const SkillRowSchema = z.object({
  id: z.string(),
  owner_id: z.string(),
  name: z.string(),
  description: z.string(),
  visibility: z.enum(['private', 'shared', 'public']),
});

const VersionRowSchema = z.object({
  skill_id: z.string(),
  version: z.coerce.number().int(),
  skill_md: z.string(),
  created_by: z.string(),
  created_at: z.coerce.date(),
});

/** Reads the platform's `skills`, `skill_versions` and `skill_collaborators` tables. */
export class PostgresSkillCatalog implements SkillCatalog {
  constructor(private db: SqlClient) {}

  async getSkill(id: string): Promise<Skill | null> {
    const { rows } = await this.db.query(
      `SELECT id::text AS id, owner_id::text AS owner_id, name, description, visibility::text AS visibility
       FROM skills WHERE id::text = $1`,
      [id]
    );
    if (rows.length === 0) return null;

    const row = SkillRowSchema.parse(rows[0]);
    return {
      id: row.id,
      ownerId: row.owner_id,
      name: row.name,
      description: row.description,
      visibility: row.visibility,
    };
  }

  async latestVersion(skillId: string): Promise<SkillVersion | null> {
    const { rows } = await this.db.query(
      `SELECT skill_id::text AS skill_id, version, skill_md, created_by::text AS created_by, created_at
       FROM skill_versions WHERE skill_id::text = $1
       ORDER BY version DESC LIMIT 1`,
      [skillId]
    );
    if (rows.length === 0) return null;

    const row = VersionRowSchema.parse(rows[0]);
    return {
      skillId: row.skill_id,
      version: row.version,
      skillMd: row.skill_md,
      createdBy: row.created_by,
      createdAt: row.created_at,
    };
  }

  async canView(skill: Skill, userId: string): Promise<boolean> {
    if (skill.ownerId === userId) return true;
    if (skill.visibility === 'public') return true;

    const { rows } = await this.db.query(
      `SELECT 1 FROM skill_collaborators WHERE skill_id::text = $1 AND user_id::text = $2 LIMIT 1`,
      [skill.id, userId]
    );
    return rows.length > 0;
  }
}
