import { describe, it, expect } from 'vitest';
import { StaticTaskCatalog, parseTaskTemplates } from '../../src/services/TaskCatalogService';
import { baseXPFor } from '../../src/services/TaskReviewService';

describe('StaticTaskCatalog', () => {
  it('loads the bundled catalog', async () => {
    const catalog = StaticTaskCatalog.fromFile();

    const dishwasher = await catalog.getTemplate('load-dishwasher');

    expect(dishwasher?.baseXPByLevel).toEqual({ 2: 20 });
    expect(catalog.list().length).toBeGreaterThan(0);
    expect(await catalog.getTemplate('unknown')).toBeNull();
  });

  it('rejects a level outside 1..5', () => {
    expect(() =>
      parseTaskTemplates([
        { id: 'x', title: 'X', description: '', category: 'misc', baseXPByLevel: { 6: 10 }, estimatedMinutes: 5 },
      ])
    ).toThrow();
  });

  it('rejects a non-positive XP override', () => {
    expect(() =>
      parseTaskTemplates([
        { id: 'x', title: 'X', description: '', category: 'misc', baseXPByLevel: { 2: 0 }, estimatedMinutes: 5 },
      ])
    ).toThrow();
  });
});

describe('baseXPFor', () => {
  const [template] = parseTaskTemplates([
    { id: 'mow', title: 'Mow', description: '', category: 'outdoor', baseXPByLevel: { 4: 50 }, estimatedMinutes: 40 },
  ]);

  it('prefers the template table', () => {
    expect(baseXPFor(4, template ?? null)).toBe(50);
  });

  it('falls back to the level default', () => {
    expect(baseXPFor(2, template ?? null)).toBe(15);
    expect(baseXPFor(5, null)).toBe(60);
  });
});
