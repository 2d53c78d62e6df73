import { describe, test, expect } from 'vitest';
import { JSDOM } from 'jsdom';
import { DomPageHandle } from '../DomPageHandle.js';
import { StaleHandleError } from '../../scraper/types/errors.js';

function pageFor(body: string) {
  const dom = new JSDOM(`<!DOCTYPE html><html><body>${body}</body></html>`);
  return { dom, document: dom.window.document, page: new DomPageHandle(dom.window.document) };
}

describe('DomPageHandle', () => {
  describe('query', () => {
    test('css query returns handles in document order', async () => {
      const { page } = pageFor('<ul><li id="a">A</li><li id="b">B</li></ul>');
      const handles = await page.query({ kind: 'css', selector: 'li' });
      expect(handles).toHaveLength(2);
      expect(await handles[0]?.getAttribute('id')).toBe('a');
      expect(await handles[1]?.getAttribute('id')).toBe('b');
    });

    test('text query keeps only the innermost match', async () => {
      const { page } = pageFor('<div class="wrap"><span>Load more</span></div>');
      const handles = await page.query({ kind: 'text', pattern: '^load more$' });
      expect(handles).toHaveLength(1);
      expect(await handles[0]?.tagName()).toBe('span');
    });

    test('exact text query compares case-insensitively', async () => {
      const { page } = pageFor('<button>Next</button><button>Next page</button>');
      const handles = await page.query({ kind: 'text', pattern: 'next', tag: 'button', exact: true });
      expect(handles).toHaveLength(1);
      expect(await handles[0]?.textContent()).toBe('Next');
    });

    test('role query covers implicit and explicit roles with a name', async () => {
      const { page } = pageFor(
        '<button>Next</button><div role="button" aria-label="Next page">›</div><button>Back</button>'
      );
      const handles = await page.query({ kind: 'role', role: 'button', name: '^next' });
      expect(handles).toHaveLength(2);
    });

    test('native checkboxes carry the checkbox role', async () => {
      const { page } = pageFor(
        '<input type="checkbox" aria-label="Select All"><input type="text" aria-label="Select All">'
      );
      const handles = await page.query({ kind: 'role', role: 'checkbox', name: '^select all$' });
      expect(handles).toHaveLength(1);
    });

    test('xpath query is evaluated against the scope', async () => {
      const { page } = pageFor('<table><tbody><tr><td>One</td></tr><tr><td>Two</td></tr></tbody></table>');
      const handles = await page.query({ kind: 'xpath', selector: '//tr[2]/td' });
      expect(handles).toHaveLength(1);
      expect(await handles[0]?.textContent()).toBe('Two');
    });

    test('scoped queries search inside the scope only', async () => {
      const { page } = pageFor('<div id="one"><p>x</p></div><div id="two"><p>y</p><p>z</p></div>');
      const [scope] = await page.query({ kind: 'css', selector: '#two' });
      expect(scope).toBeDefined();
      const handles = await page.query({ kind: 'css', selector: 'p' }, scope);
      expect(handles).toHaveLength(2);
    });
  });

  describe('element handles', () => {
    test('innerText puts block children on their own lines', async () => {
      const { page } = pageFor('<div id="c"><div>Show more</div><div>Renew</div></div>');
      const [el] = await page.query({ kind: 'css', selector: '#c' });
      expect(await el?.innerText()).toBe('Show more\nRenew');
    });

    test('innerText joins table cells on one line', async () => {
      const { page } = pageFor('<table><tbody><tr id="r"><td>Fix login</td><td>Bug</td></tr></tbody></table>');
      const [row] = await page.query({ kind: 'css', selector: '#r' });
      expect(await row?.innerText()).toBe('Fix login Bug');
    });

    test('innerText skips hidden descendants', async () => {
      const { page } = pageFor('<div id="d">Visible<span style="display:none">Hidden</span></div>');
      const [el] = await page.query({ kind: 'css', selector: '#d' });
      expect(await el?.innerText()).toBe('Visible');
      expect(await el?.textContent()).toBe('VisibleHidden');
    });

    test('visibility follows display, visibility and hidden on ancestors', async () => {
      const { page } = pageFor(
        '<div style="display:none"><span id="a">a</span></div><div hidden><span id="b">b</span></div><span id="c">c</span>'
      );
      const [a] = await page.query({ kind: 'css', selector: '#a' });
      const [b] = await page.query({ kind: 'css', selector: '#b' });
      const [c] = await page.query({ kind: 'css', selector: '#c' });
      expect(await a?.isVisible()).toBe(false);
      expect(await b?.isVisible()).toBe(false);
      expect(await c?.isVisible()).toBe(true);
    });

    test('disabled and aria-disabled controls are not enabled', async () => {
      const { page } = pageFor(
        '<button id="a" disabled>A</button><button id="b" aria-disabled="true">B</button><button id="c">C</button>'
      );
      const handles = await page.query({ kind: 'css', selector: 'button' });
      const enabled = await Promise.all(handles.map((h) => h.isEnabled()));
      expect(enabled).toEqual([false, false, true]);
    });

    test('closest reports ancestors matching a selector', async () => {
      const { page } = pageFor('<table><tbody><tr><td><button id="b">x</button></td></tr></tbody></table>');
      const [button] = await page.query({ kind: 'css', selector: '#b' });
      expect(await button?.closest('tbody tr')).toBe(true);
      expect(await button?.closest('thead')).toBe(false);
    });

    test('a detached node raises StaleHandleError', async () => {
      const { page, document } = pageFor('<p id="x">gone soon</p>');
      const [el] = await page.query({ kind: 'css', selector: '#x' });
      document.getElementById('x')?.remove();

      expect(await el?.isAttached()).toBe(false);
      await expect(el?.textContent()).rejects.toBeInstanceOf(StaleHandleError);
    });
  });

  describe('actions', () => {
    test('click dispatches a click event', async () => {
      const { page, document } = pageFor('<button id="b">Go</button>');
      let clicks = 0;
      document.getElementById('b')?.addEventListener('click', () => clicks++);

      const [button] = await page.query({ kind: 'css', selector: '#b' });
      expect(button).toBeDefined();
      if (button) await page.click(button);
      expect(clicks).toBe(1);
    });

    test('released handles cannot be acted on', async () => {
      const { page } = pageFor('<button id="b">Go</button>');
      const [button] = await page.query({ kind: 'css', selector: '#b' });
      await page.releaseHandles();

      expect(button).toBeDefined();
      if (button) {
        await expect(page.click(button)).rejects.toBeInstanceOf(StaleHandleError);
      }
    });

    test('typeText sets the value of an input', async () => {
      const { page, document } = pageFor('<input id="q" />');
      const [input] = await page.query({ kind: 'css', selector: '#q' });
      if (input) await page.typeText(input, 'firewall');
      expect(document.querySelector('input')?.value).toBe('firewall');
    });

    test('scrolling and paging keys fire window scroll events', async () => {
      const { page, dom } = pageFor('<p>x</p>');
      let scrolls = 0;
      dom.window.addEventListener('scroll', () => scrolls++);

      await page.scrollTo('bottom');
      await page.pressKey('End');
      await page.pressKey('PageDown');
      await page.pressKey('Enter');

      expect(scrolls).toBe(3);
    });
  });

  describe('scripts', () => {
    test('queryByScript runs a named element script', async () => {
      const { page } = pageFor(
        '<table><tr><th>Title</th><th>Type</th></tr><tr><td>Fix login</td><td>Bug</td></tr><tr><td>Only</td><td></td></tr></table>'
      );
      const rows = await page.queryByScript('dataRows');
      expect(rows).toHaveLength(1);
      expect(await rows[0]?.innerText()).toBe('Fix login Bug');
    });

    test('evaluate runs a named value script within a scope', async () => {
      const { page } = pageFor(
        '<table><tbody><tr><td id="p" class="cell"><span class="sapMObjStatusNegative"></span></td></tr></tbody></table>'
      );
      const [cell] = await page.query({ kind: 'css', selector: '#p' });
      expect(await page.evaluate('classTokens', {}, cell)).toEqual(['cell', 'sapMObjStatusNegative']);
    });

    test('unknown script names are rejected', async () => {
      const { page } = pageFor('<p>x</p>');
      await expect(page.queryByScript('noSuchScript')).rejects.toThrow('Unknown element script');
    });
  });
});
