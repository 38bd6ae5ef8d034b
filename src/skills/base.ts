import type { Skill, SkillVersion } from '../types/skill.js';

/** Read-only view of the skill tables; nothing here writes. */
export interface SkillCatalog {
  getSkill(id: string): Promise<Skill | null>;
  latestVersion(skillId: string): Promise<SkillVersion | null>;
  canView(skill: Skill, userId: string): Promise<boolean>;
}
