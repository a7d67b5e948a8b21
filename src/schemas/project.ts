import { z } from 'zod';

export const APP_TYPES = [
  'Web Application',
  'Mobile Application (Native)',
  'Mobile Application (Cross-Platform)',
  'API Backend',
  'Data Analytics Platform',
  'AI/ML Application',
  'Other'
] as const;

export const TEAM_SKILLS = [
  'Python', 'JavaScript', 'Java', 'C#', 'Ruby', 'Go', 'Swift', 'Kotlin',
  'React', 'Vue', 'Angular', 'Node.js', 'Django', 'Flask', 'SQL', 'NoSQL',
  'AWS', 'Azure', 'GCP', 'None'
] as const;

export const BUDGETS = ['Low', 'Medium', 'High'] as const;

export const TIMELINES = [
  'Very Short (Under 1 month)',
  'Short (1-3 months)',
  'Medium (3-6 months)',
  'Long (6-12 months)'
] as const;

export const SCALABILITY_NEEDS = ['Low', 'Medium', 'High', 'Very High'] as const;

export const ProjectDetailsSchema = z.object({
  project_description: z.string().default(''),
  app_type: z.enum(APP_TYPES),
  team_skills: z.array(z.enum(TEAM_SKILLS)).default([])
    .transform(skills => [...new Set(skills)]),
  budget: z.enum(BUDGETS),
  timeline: z.enum(TIMELINES),
  scalability_needs: z.enum(SCALABILITY_NEEDS).optional()
});

export type ProjectDetails = z.infer<typeof ProjectDetailsSchema>;
export type AppType = ProjectDetails['app_type'];
export type TeamSkill = (typeof TEAM_SKILLS)[number];
export type Budget = ProjectDetails['budget'];
export type Timeline = ProjectDetails['timeline'];
export type ScalabilityNeed = (typeof SCALABILITY_NEEDS)[number];

export const DEFAULT_PROJECT_DETAILS: ProjectDetails = {
  project_description: '',
  app_type: 'Web Application',
  team_skills: [],
  budget: 'Medium',
  timeline: 'Medium (3-6 months)',
  scalability_needs: 'Medium'
};

export class ProjectDetailsError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid project details: ${issues.join('; ')}`);
    this.name = 'ProjectDetailsError';
  }
}

export function parseProjectDetails(raw: unknown): ProjectDetails {
  const parsed = ProjectDetailsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProjectDetailsError(
      parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  return parsed.data;
}
