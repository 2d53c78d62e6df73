import { describe, test, expect } from 'vitest';
import { LazyLoadConvergence, adaptiveDelay, isSatisfied } from '../handlers/LazyLoadConvergence.js';
import { LocatorChain } from '../locator/LocatorChain.js';
import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from '../../config/EngineConfig.js';
import { getDefaultCatalog } from '../../config/LocatorCatalog.js';
import { appendRows, createPage, FAST_CONFIG } from './fixtures.js';
import type { EngineConfig } from '../../config/EngineConfig.js';
import type { LoadProgress } from '../handlers/LazyLoadConvergence.js';

type ConvergenceConfig = EngineConfig['convergence'];

function convergenceConfig(overrides: Partial<ConvergenceConfig> = {}): ConvergenceConfig {
  return { ...resolveEngineConfig(FAST_CONFIG).convergence, ...overrides };
}

/**
 * Issue table whose rows grow on window scroll events until a cap,
 * the way an infinite-scroll list renders more rows
 */
function lazyTable(initial: number, perScroll: number, cap: number) {
  const fixture = createPage('<table><tbody id="rows"></tbody></table>');
  const { dom, document } = fixture;
  const tbody = document.getElementById('rows');
  if (!tbody) throw new Error('fixture has no tbody');
  appendRows(document, tbody, initial);

  dom.window.addEventListener('scroll', () => {
    const missing = cap - tbody.children.length;
    if (missing > 0) appendRows(document, tbody, Math.min(perScroll, missing));
  });
  return { ...fixture, tbody };
}

function loaderFor(fixture: ReturnType<typeof createPage>, config: ConvergenceConfig, progress?: LoadProgress[]) {
  const catalog = getDefaultCatalog();
  return new LazyLoadConvergence(
    fixture.page,
    new LocatorChain(fixture.page),
    { rows: catalog.get('issueRows'), showMore: catalog.get('showMore') },
    config,
    { onProgress: (p) => progress?.push(p) }
  );
}

describe('LazyLoadConvergence', () => {
  test('stops as stagnant at the plateau below the target', async () => {
    const fixture = lazyTable(20, 10, 40);
    const loader = loaderFor(fixture, convergenceConfig({ stagnationThreshold: 3, recoveryAttempts: 1 }));

    const result = await loader.loadAll(200);

    expect(result).toEqual({
      finalRowCount: 40,
      state: 'stagnant',
      iterations: 5,
      recoveries: 1,
      targetEstimate: 200,
      history: [30, 40, 40, 40, 40],
    });
  });

  test('is satisfied once the target is reached', async () => {
    const fixture = lazyTable(10, 10, 200);
    const loader = loaderFor(fixture, convergenceConfig());

    const result = await loader.loadAll(50);

    expect(result.state).toBe('satisfied');
    expect(result.iterations).toBe(4);
    expect(result.history).toEqual([20, 30, 40, 50]);
  });

  test('is satisfied at 95% of the target', async () => {
    const fixture = lazyTable(95, 10, 95);
    const result = await loaderFor(fixture, convergenceConfig()).loadAll(100);

    expect(result.state).toBe('satisfied');
    expect(result.iterations).toBe(0);
  });

  test('returns immediately when already satisfied', async () => {
    const fixture = lazyTable(50, 10, 50);
    const result = await loaderFor(fixture, convergenceConfig()).loadAll(50);

    expect(result).toEqual({
      finalRowCount: 50,
      state: 'satisfied',
      iterations: 0,
      recoveries: 0,
      targetEstimate: 50,
      history: [],
    });
  });

  test('is exhausted when the iteration budget runs out', async () => {
    const fixture = lazyTable(10, 1, 10_000);
    const loader = loaderFor(fixture, convergenceConfig({ stagnationThreshold: 50 }));

    const result = await loader.loadAll(1000, 5);

    expect(result.state).toBe('exhausted');
    expect(result.finalRowCount).toBe(15);
    expect(result.history).toEqual([11, 12, 13, 14, 15]);
  });

  test('a recovery that loads rows resets stagnation', async () => {
    const fixture = lazyTable(20, 0, 20);
    const { dom, document, tbody } = fixture;
    dom.window.addEventListener('resize', () => appendRows(document, tbody, 10));
    const loader = loaderFor(fixture, convergenceConfig({ stagnationThreshold: 2, recoveryAttempts: 1 }));

    const result = await loader.loadAll(30);

    expect(result.state).toBe('satisfied');
    expect(result.recoveries).toBe(1);
    expect(result.iterations).toBe(2);
    expect(result.history).toEqual([20, 20, 30]);
  });

  test('clicks a show-more control on its interval', async () => {
    const fixture = createPage(
      '<table><tbody id="rows"></tbody></table><button data-action="show-more" id="more">Show more</button>'
    );
    const { document } = fixture;
    const tbody = document.getElementById('rows');
    if (!tbody) throw new Error('fixture has no tbody');
    appendRows(document, tbody, 10);
    document.getElementById('more')?.addEventListener('click', () => appendRows(document, tbody, 10));

    const result = await loaderFor(fixture, convergenceConfig({ showMoreInterval: 1 })).loadAll(30);

    expect(result.state).toBe('satisfied');
    expect(result.iterations).toBe(2);
    expect(tbody.children).toHaveLength(30);
  });

  test('reports the best count even when rows are recycled', async () => {
    const fixture = createPage('<table><tbody id="rows"></tbody></table>');
    const { dom, document } = fixture;
    const tbody = document.getElementById('rows');
    if (!tbody) throw new Error('fixture has no tbody');
    appendRows(document, tbody, 20);

    // Virtualized list: the rendered window shrinks on the second scroll
    const sizes = [30, 25, 35];
    let scroll = 0;
    dom.window.addEventListener('scroll', () => {
      const size = sizes[scroll++] ?? 35;
      while (tbody.children.length > size) tbody.lastElementChild?.remove();
      appendRows(document, tbody, size - tbody.children.length);
    });
    const progress: LoadProgress[] = [];

    const result = await loaderFor(fixture, convergenceConfig({ stagnationThreshold: 10 }), progress).loadAll(100, 3);

    expect(result.history).toEqual([30, 30, 35]);
    expect(result.finalRowCount).toBe(35);
    expect(progress.map((p) => p.rowCount)).toEqual([30, 25, 35]);
    for (let i = 1; i < result.history.length; i++) {
      expect(result.history[i]).toBeGreaterThanOrEqual(result.history[i - 1] ?? 0);
    }
  });

  describe('helpers', () => {
    test('isSatisfied uses the ratio', () => {
      expect(isSatisfied(95, 100, 0.95)).toBe(true);
      expect(isSatisfied(94, 100, 0.95)).toBe(false);
      expect(isSatisfied(0, 0, 0.95)).toBe(false);
    });

    test('adaptiveDelay grows with stagnation and rows up to the cap', () => {
      const config = DEFAULT_ENGINE_CONFIG.convergence;
      const state = { previousCount: 100, noChangeStreak: 3, iteration: 4, targetEstimate: 500, bestCount: 100, recoveries: 0 };

      expect(adaptiveDelay(state, config)).toBe(600);
      expect(adaptiveDelay({ ...state, noChangeStreak: 20, bestCount: 1000 }, config)).toBe(1000);
    });
  });
});
