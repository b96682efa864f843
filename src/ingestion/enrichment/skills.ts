import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { CrawlStore, Enricher, Posting, SkillTag } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const SKILLS_PATH = resolve(__dirname, '../../../config/skills.json');

const skillListSchema = z.array(z.object({ name: z.string().min(1), type: z.string().min(1) }));

export function loadSkillList(path = SKILLS_PATH): SkillTag[] {
  return skillListSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

interface CompiledSkill extends SkillTag {
  pattern: RegExp;
}

/** Keyword tagging over title and description. Keywords like `C++` or `Node.js` match as whole tokens. */
export class SkillTagger implements Enricher {
  readonly name = 'skills';
  private readonly skills: CompiledSkill[];

  constructor(
    private readonly store: Pick<CrawlStore, 'saveSkills'>,
    skills: SkillTag[] = loadSkillList(),
  ) {
    this.skills = skills.map(skill => ({
      ...skill,
      pattern: new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(skill.name)}(?![A-Za-z0-9+#])`, 'i'),
    }));
  }

  tag(text: string): SkillTag[] {
    if (!text) return [];
    const seen = new Set<string>();
    const found: SkillTag[] = [];
    for (const { name, type, pattern } of this.skills) {
      if (seen.has(name.toLowerCase()) || !pattern.test(text)) continue;
      seen.add(name.toLowerCase());
      found.push({ name, type });
    }
    return found;
  }

  async enrich(posting: Posting): Promise<void> {
    const skills = this.tag(`${posting.title}\n${posting.description ?? ''}`);
    if (skills.length === 0) return;
    await this.store.saveSkills(posting.source, posting.sourceId, skills);
  }
}
