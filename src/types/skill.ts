export type SkillVisibility = 'private' | 'shared' | 'public';

export type CollaboratorRole = 'editor' | 'viewer';

export interface Skill {
  id: string;
  ownerId: string;
  name: string;
  description: string;
  visibility: SkillVisibility;
}

export interface SkillVersion {
  skillId: string;
  version: number;
  skillMd: string;
  createdBy: string;
  createdAt: Date;
}

export interface SkillCollaborator {
  skillId: string;
  userId: string;
  role: CollaboratorRole;
}
