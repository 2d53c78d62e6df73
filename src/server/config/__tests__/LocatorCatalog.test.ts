import { describe, test, expect } from 'vitest';
import { LocatorCatalog, REQUIRED_TARGETS, getDefaultCatalog } from '../LocatorCatalog.js';

function minimalTable() {
  return {
    navigation: [],
    targets: REQUIRED_TARGETS.map((target) => ({
      target,
      strategies: [{ kind: 'css' as const, selector: `.${target}` }],
    })),
  };
}

describe('LocatorCatalog', () => {
  test('bundled catalog defines every required target', () => {
    const catalog = getDefaultCatalog();
    for (const target of REQUIRED_TARGETS) {
      expect(catalog.has(target)).toBe(true);
    }
    expect(catalog.navigationTargets().map((s) => s.target)).toEqual(['issuesTab']);
  });

  test('script strategies come after structural ones in the bundled catalog', () => {
    const catalog = getDefaultCatalog();
    for (const target of catalog.targets()) {
      const kinds = catalog.get(target).strategies.map((s) => s.kind);
      const firstScript = kinds.indexOf('script');
      if (firstScript >= 0) {
        expect(kinds.slice(firstScript).every((k) => k === 'script')).toBe(true);
      }
    }
  });

  test('rejects a table missing a required target', () => {
    const table = minimalTable();
    table.targets = table.targets.filter((t) => t.target !== 'nextPage');
    expect(() => LocatorCatalog.fromJSON(table)).toThrow('Invalid locator table: missing targets nextPage');
  });

  test('rejects duplicate targets', () => {
    const table = minimalTable();
    table.targets.push({ target: 'showMore', strategies: [{ kind: 'css', selector: '.again' }] });
    expect(() => LocatorCatalog.fromJSON(table)).toThrow('duplicate target "showMore"');
  });

  test('rejects malformed strategies', () => {
    expect(() =>
      LocatorCatalog.fromJSON({ targets: [{ target: 'issueRows', strategies: [{ kind: 'css', selector: '' }] }] })
    ).toThrow(/Invalid locator table config/);
  });

  test('extend appends strategies without touching the original', () => {
    const catalog = LocatorCatalog.fromJSON(minimalTable());
    const extended = catalog.extend({ showMore: [{ kind: 'css', selector: '.more-v2' }] });

    expect(extended.get('showMore').strategies).toEqual([
      { kind: 'css', selector: '.showMore' },
      { kind: 'css', selector: '.more-v2' },
    ]);
    expect(catalog.get('showMore').strategies).toHaveLength(1);
  });

  test('unknown targets throw and specs are frozen', () => {
    const catalog = LocatorCatalog.fromJSON(minimalTable());
    expect(() => catalog.get('nope')).toThrow('Locator target not found in config: nope');
    expect(Object.isFrozen(catalog.get('issueRows'))).toBe(true);
    expect(Object.isFrozen(catalog.get('issueRows').strategies)).toBe(true);
  });
});
