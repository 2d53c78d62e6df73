import { describe, test, expect } from 'vitest';
import { LocatorChain, describeStrategy } from '../locator/LocatorChain.js';
import { DomPageHandle } from '../../page/DomPageHandle.js';
import {
  DEFAULT_RETRY_CONFIG,
  EngineErrorType,
  FatalIOError,
  StaleHandleError,
} from '../types/errors.js';
import { getDefaultCatalog } from '../../config/LocatorCatalog.js';
import { createPage } from './fixtures.js';
import type { ElementHandle } from '../../page/PageHandle.js';
import type { QuerySpec } from '../../../shared/types.js';

const FAST_RETRY = { ...DEFAULT_RETRY_CONFIG, retryDelay: 0 };

/** Click fails with the given errors before succeeding */
class FlakyPage extends DomPageHandle {
  clickAttempts = 0;

  constructor(document: Document, private failures: Error[]) {
    super(document);
  }

  async click(handle: ElementHandle): Promise<void> {
    this.clickAttempts++;
    const failure = this.failures.shift();
    if (failure) throw failure;
    return super.click(handle);
  }
}

function spec(overrides: Partial<QuerySpec> & Pick<QuerySpec, 'strategies'>): QuerySpec {
  return { target: 'control', ...overrides };
}

async function idOf(handle: ElementHandle): Promise<string | null> {
  return handle.getAttribute('id');
}

describe('LocatorChain', () => {
  describe('resolve', () => {
    test('skips hidden candidates', async () => {
      const { page } = createPage(
        '<button id="a" data-action="show-more" style="display:none">Show more</button>' +
          '<button id="b" data-action="show-more">Show more</button>'
      );
      const chain = new LocatorChain(page);

      const result = await chain.resolve(spec({ strategies: [{ kind: 'css', selector: '[data-action="show-more"]' }] }));

      expect(result.kind).toBe('found');
      if (result.kind === 'found') expect(await idOf(result.handle)).toBe('b');
    });

    test('requires an enabled control only when interactable is requested', async () => {
      const { page } = createPage('<button id="a" class="next" disabled>Next</button><button id="b" class="next">Next</button>');
      const chain = new LocatorChain(page);
      const strategies = [{ kind: 'css' as const, selector: '.next' }];

      const any = await chain.resolve(spec({ strategies }));
      const interactable = await chain.resolve(spec({ strategies, requireInteractable: true }));

      if (any.kind !== 'found' || interactable.kind !== 'found') throw new Error('expected both to resolve');
      expect(await idOf(any.handle)).toBe('a');
      expect(await idOf(interactable.handle)).toBe('b');
    });

    test('rejects candidates inside excluded containers', async () => {
      const { page } = createPage(
        '<table><tbody><tr><td><button id="in-row" class="more">Show more</button></td></tr></tbody></table>' +
          '<button id="outside" class="more">Show more</button>'
      );
      const chain = new LocatorChain(page);

      const result = await chain.resolve(
        spec({ strategies: [{ kind: 'css', selector: '.more' }], excludeWithin: ['tbody tr'] })
      );

      if (result.kind !== 'found') throw new Error('expected a match');
      expect(await idOf(result.handle)).toBe('outside');
    });

    test('falls through to the next strategy and reports its index', async () => {
      const { page } = createPage('<button id="more">Load more</button>');
      const chain = new LocatorChain(page);

      const result = await chain.resolve(
        spec({
          strategies: [
            { kind: 'css', selector: '.missing' },
            { kind: 'text', pattern: '^load more$', tag: 'button' },
          ],
        })
      );

      if (result.kind !== 'found') throw new Error('expected a match');
      expect(result.strategyIndex).toBe(1);
      expect(result.strategy.kind).toBe('text');
    });

    test('tries scripted strategies only after every structural one', async () => {
      const { page } = createPage('<button id="script-next">Next</button><a id="css-next">Forward</a>');
      const chain = new LocatorChain(page);

      const result = await chain.resolve(
        spec({
          strategies: [
            { kind: 'script', script: 'controlsByLabel', arg: { labels: ['Next'] } },
            { kind: 'css', selector: '#css-next' },
          ],
        })
      );

      if (result.kind !== 'found') throw new Error('expected a match');
      expect(await idOf(result.handle)).toBe('css-next');
      expect(result.strategyIndex).toBe(1);
    });

    test('uses a scripted fallback when structural strategies find nothing', async () => {
      const { page } = createPage('<button id="de">Mehr anzeigen</button>');
      const chain = new LocatorChain(page);

      const result = await chain.resolve(
        spec({
          strategies: [
            { kind: 'css', selector: '.missing' },
            { kind: 'script', script: 'controlsByLabel', arg: { labels: ['Mehr anzeigen'] } },
          ],
        })
      );

      if (result.kind !== 'found') throw new Error('expected a match');
      expect(result.strategy.kind).toBe('script');
      expect(await idOf(result.handle)).toBe('de');
    });

    test('reports every attempted strategy when nothing matches', async () => {
      const { page } = createPage('<p>nothing here</p>');
      const chain = new LocatorChain(page);

      const result = await chain.resolve(
        spec({
          target: 'nextPage',
          strategies: [
            { kind: 'css', selector: '.a' },
            { kind: 'text', pattern: 'next' },
          ],
        })
      );

      expect(result).toEqual({ kind: 'not_found', target: 'nextPage', attempted: ['css:.a', 'text:next'] });
    });
  });

  describe('resolveAll', () => {
    test('returns usable handles from the first qualifying strategy', async () => {
      const { page } = createPage(
        '<table><thead><tr><th>Title</th></tr></thead><tbody><tr><td>A</td></tr><tr><td>B</td></tr></tbody></table>'
      );
      const chain = new LocatorChain(page);
      const rows = spec({
        strategies: [
          { kind: 'css', selector: '.grid-row' },
          { kind: 'css', selector: 'tr' },
        ],
        excludeWithin: ['thead'],
      });

      const result = await chain.resolveAll(rows);

      expect(result.handles).toHaveLength(2);
      expect(result.strategy).toEqual({ kind: 'css', selector: 'tr' });
      expect(await chain.count(rows)).toBe(2);
    });

    test('hidden template rows are neither resolved nor counted', async () => {
      const { page } = createPage(
        '<table><tbody><tr style="display:none"><td>{{title}}</td><td>{{type}}</td></tr>' +
          '<tr id="real"><td>Fix login</td><td>Bug</td></tr></tbody></table>'
      );
      const chain = new LocatorChain(page);
      const rows = getDefaultCatalog().get('issueRows');

      const first = await chain.resolve(rows);

      if (first.kind !== 'found') throw new Error('expected a row');
      expect(await idOf(first.handle)).toBe('real');
      expect(await first.handle.isVisible()).toBe(true);
      expect(await chain.count(rows)).toBe(1);
    });

    test('moves on when a strategy yields fewer than minCount', async () => {
      const { page } = createPage('<div class="one">x</div><li>a</li><li>b</li>');
      const chain = new LocatorChain(page);

      const result = await chain.resolveAll(
        spec({ strategies: [{ kind: 'css', selector: '.one' }, { kind: 'css', selector: 'li' }] }),
        undefined,
        2
      );

      expect(result.handles).toHaveLength(2);
    });
  });

  describe('resolveAndAct', () => {
    test('re-resolves after a stale handle and then acts', async () => {
      const { document } = createPage('<button id="go">Go</button>');
      let clicks = 0;
      document.getElementById('go')?.addEventListener('click', () => clicks++);
      const page = new FlakyPage(document, [new StaleHandleError('dom-1')]);
      const chain = new LocatorChain(page, { retry: FAST_RETRY });

      const result = await chain.resolveAndAct(spec({ strategies: [{ kind: 'css', selector: '#go' }] }), { kind: 'click' });

      expect(result.kind).toBe('acted');
      if (result.kind === 'acted') expect(result.attempts).toBe(2);
      expect(page.clickAttempts).toBe(2);
      expect(clicks).toBe(1);
    });

    test('gives up after the retry budget', async () => {
      const { document } = createPage('<button id="go">Go</button>');
      const stale = [1, 2, 3, 4, 5].map((n) => new StaleHandleError(`dom-${n}`));
      const page = new FlakyPage(document, stale);
      const chain = new LocatorChain(page, { retry: { ...FAST_RETRY, maxRetries: 2 } });

      const result = await chain.resolveAndAct(spec({ strategies: [{ kind: 'css', selector: '#go' }] }), { kind: 'click' });

      expect(result.kind).toBe('failed');
      if (result.kind === 'failed') {
        expect(result.attempts).toBe(3);
        expect(result.error.type).toBe(EngineErrorType.STALE_HANDLE);
      }
    });

    test('does not retry errors that are not retriable', async () => {
      const { document } = createPage('<button id="go">Go</button>');
      const page = new FlakyPage(document, [new Error('boom')]);
      const chain = new LocatorChain(page, { retry: FAST_RETRY });

      const result = await chain.resolveAndAct(spec({ strategies: [{ kind: 'css', selector: '#go' }] }), { kind: 'click' });

      expect(result.kind).toBe('failed');
      expect(page.clickAttempts).toBe(1);
    });

    test('returns not_found without acting', async () => {
      const { page } = createPage('<p>x</p>');
      const chain = new LocatorChain(page);

      const result = await chain.resolveAndAct(spec({ strategies: [{ kind: 'css', selector: '#go' }] }), { kind: 'click' });

      expect(result.kind).toBe('not_found');
    });

    test('propagates a lost page', async () => {
      const { document } = createPage('<button id="go">Go</button>');
      const page = new FlakyPage(document, [new FatalIOError('page closed')]);
      const chain = new LocatorChain(page, { retry: FAST_RETRY });

      await expect(
        chain.resolveAndAct(spec({ strategies: [{ kind: 'css', selector: '#go' }] }), { kind: 'click' })
      ).rejects.toBeInstanceOf(FatalIOError);
    });
  });

  test('describeStrategy prefers the description', () => {
    expect(describeStrategy({ kind: 'css', selector: 'tr', description: 'table rows' })).toBe('css:table rows');
    expect(describeStrategy({ kind: 'role', role: 'button', name: '^next$' })).toBe('role:button[^next$]');
    expect(describeStrategy({ kind: 'script', script: 'dataRows' })).toBe('script:dataRows');
  });
});
