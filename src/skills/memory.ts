import type { Skill, SkillCollaborator, SkillVersion } from '../types/skill.js';
import type { SkillCatalog } from './base.js';

export class InMemorySkillCatalog implements SkillCatalog {
  private skills = new Map<string, Skill>();
  private versions = new Map<string, SkillVersion[]>();
  private collaborators = new Map<string, SkillCollaborator[]>();

  addSkill(skill: Skill): void {
    this.skills.set(skill.id, skill);
  }

  addVersion(version: SkillVersion): void {
    const list = this.versions.get(version.skillId) ?? [];
    list.push(version);
    this.versions.set(version.skillId, list);
  }

  addCollaborator(collaborator: SkillCollaborator): void {
    const list = (this.collaborators.get(collaborator.skillId) ?? [])
      .filter((c) => c.userId !== collaborator.userId);
    list.push(collaborator);
    this.collaborators.set(collaborator.skillId, list);
  }

  async getSkill(id: string): Promise<Skill | null> {
    return this.skills.get(id) ?? null;
  }

  async latestVersion(skillId: string): Promise<SkillVersion | null> {
    const list = this.versions.get(skillId) ?? [];
    let latest: SkillVersion | null = null;
    for (const version of list) {
      if (!latest || version.version > latest.version) latest = version;
    }
    return latest;
  }

  async canView(skill: Skill, userId: string): Promise<boolean> {
    if (skill.ownerId === userId) return true;
    if (skill.visibility === 'public') return true;
    // Any collaborator role grants view access
    return (this.collaborators.get(skill.id) ?? []).some((c) => c.userId === userId);
  }
}
