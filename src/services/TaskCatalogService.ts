/**
 * Task template catalog, loaded once from data/task-templates.json.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { TaskCatalog, TaskLevel, TaskTemplate } from '../types';

const levelKeySchema = z.enum(['1', '2', '3', '4', '5']);

const templateSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  category: z.string(),
  baseXPByLevel: z.record(levelKeySchema, z.number().int().positive()),
  estimatedMinutes: z.number().int().nonnegative(),
});

const catalogFileSchema = z.array(templateSchema);

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '../../data/task-templates.json');

function toLevel(key: z.infer<typeof levelKeySchema>): TaskLevel {
  switch (key) {
    case '1': return 1;
    case '2': return 2;
    case '3': return 3;
    case '4': return 4;
    case '5': return 5;
  }
}

export function parseTaskTemplates(raw: unknown): TaskTemplate[] {
  return catalogFileSchema.parse(raw).map(entry => {
    const baseXPByLevel: Partial<Record<TaskLevel, number>> = {};
    for (const [key, xp] of Object.entries(entry.baseXPByLevel)) {
      const level = levelKeySchema.safeParse(key);
      if (level.success && xp !== undefined) {
        baseXPByLevel[toLevel(level.data)] = xp;
      }
    }
    return { ...entry, baseXPByLevel };
  });
}

export class StaticTaskCatalog implements TaskCatalog {
  private readonly templates: Map<string, TaskTemplate>;

  constructor(templates: TaskTemplate[]) {
    this.templates = new Map(templates.map(t => [t.id, t]));
  }

  static fromFile(filePath: string = DEFAULT_CATALOG_PATH): StaticTaskCatalog {
    const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
    return new StaticTaskCatalog(parseTaskTemplates(raw));
  }

  async getTemplate(templateId: string): Promise<TaskTemplate | null> {
    return this.templates.get(templateId) ?? null;
  }

  list(): TaskTemplate[] {
    return [...this.templates.values()];
  }
}
