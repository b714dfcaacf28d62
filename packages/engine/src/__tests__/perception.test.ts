import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { isPerceptionError } from 'perception-shared';
import { PerceptionSession, extractActionSpace } from '../perception';
import {
  $,
  attachFrameDocument,
  frame,
  installLayout,
  restoreLayout,
  setBody,
  setBox,
} from './helpers/layout';

function addButton(label: string): HTMLButtonElement {
  const button = document.createElement('button');
  button.textContent = label;
  document.body.appendChild(button);
  return button;
}

describe('perception', () => {
  beforeEach(() => {
    installLayout();
    document.body.innerHTML = '';
    document.title = 'Test Page';
  });

  afterEach(() => {
    restoreLayout();
  });

  describe('extractActionSpace', () => {
    it('yields one input and one button for a bare form', () => {
      setBody('<input type="text"><button>Go</button>');
      const { space } = extractActionSpace(document);

      const inputs = space.actions({ role: 'input' });
      const buttons = space.actions({ role: 'button' });
      expect(inputs.map((a) => a.id)).toEqual(['I1']);
      expect(inputs[0].parameters).toEqual([{ name: 'value', type: 'str' }]);
      expect(buttons.map((a) => a.id)).toEqual(['B1']);
      expect(buttons[0].parameters).toBeUndefined();
      expect(space.size).toBe(2);
    });

    it('describes a select with its options and current value', () => {
      setBody('<select><option>A</option><option>B</option><option>C</option></select>');
      const select = $('select');
      if (select instanceof HTMLSelectElement) select.value = 'B';

      const action = extractActionSpace(document).space.get('I1');
      expect(action.parameters).toEqual([{ name: 'value', type: 'str', allowedValues: ['A', 'B', 'C'], default: 'B' }]);
      expect(action.description).toBe('Select unlabeled dropdown');
    });

    it('is idempotent on an unchanged page', () => {
      setBody('<nav><a href="/home">Home</a></nav><input placeholder="Name"><button>Send</button>');
      const first = extractActionSpace(document);
      const second = extractActionSpace(document);
      expect(second.space.toJSON()).toEqual(first.space.toJSON());
      expect(first.space.ids()).toEqual(['L1', 'I1', 'B1']);
    });

    it('never lists invisible elements', () => {
      setBody('<button id="a" style="display: none">A</button><button id="b">B</button><button id="c">C</button>');
      setBox($('#c'), { height: 0 });
      const { space, highlights } = extractActionSpace(document);
      expect(space.ids()).toEqual(['B1']);
      expect(space.get('B1').description).toBe('Click "B"');
      expect(highlights).toEqual([{ highlightIndex: 0, actionId: 'B1' }]);
    });

    it('lists frame content even far outside the viewport', () => {
      setBody('<iframe></iframe>');
      const frameDoc = attachFrameDocument(frame(), '<a href="/inner">Inner</a>');
      setBox($('a', frameDoc), { y: 9000 });

      const { space } = extractActionSpace(document, { viewportExpansion: 0 });
      expect(space.get('L1')).toMatchObject({
        description: 'Open "Inner"',
        category: 'Navigation',
        path: 'html/body/iframe#frame/html/body/a',
      });
    });

    it('reports page metadata', () => {
      setBody('<button>Go</button>');
      const extraction = extractActionSpace(document);
      expect(extraction.title).toBe('Test Page');
      expect(extraction.url).toBe(document.URL);
      expect(extraction.space.title).toBe('Test Page');
      expect(extraction.snapshotId).toMatch(/^snap-\d+-[a-z0-9]+$/);
      expect(extraction.incremental).toBe(false);
      expect(extraction.tree?.tag).toBe('body');
    });

    it('returns geometry per highlight when asked', () => {
      setBody('<button>Go</button>');
      setBox($('button'), { x: 4, y: 8, width: 16, height: 32 });
      const { highlights } = extractActionSpace(document, { highlight: true });
      expect(highlights).toEqual([
        {
          highlightIndex: 0,
          actionId: 'B1',
          geometry: { rect: { x: 4, y: 8, width: 16, height: 32 }, frameOffset: { x: 0, y: 0 }, scroll: { x: 0, y: 0 } },
        },
      ]);
    });

    it('rejects invalid options', () => {
      setBody('<button>Go</button>');
      let caught: unknown;
      try {
        extractActionSpace(document, { highlightFromIndex: -1 });
      } catch (err) {
        caught = err;
      }
      expect(isPerceptionError(caught, 'INVALID_OPTIONS')).toBe(true);
    });

    it('extracts fresh from a malformed previous space', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      setBody('<button>Go</button>');
      const extraction = extractActionSpace(document, {}, {
        pathScheme: 'positional-v1',
        url: '',
        title: '',
        actions: [
          { id: 'B1', role: 'button', description: 'a', category: 'x', tag: 'button', path: 'p', fingerprint: 'f' },
          { id: 'B1', role: 'button', description: 'b', category: 'x', tag: 'button', path: 'q', fingerprint: 'f' },
        ],
      });
      expect(extraction.incremental).toBe(false);
      expect(extraction.space.ids()).toEqual(['B1']);
      expect(warn).toHaveBeenCalledWith(
        '[Perception:extract] Ignoring previous action space, extracting fresh: Duplicate action ID B1'
      );
    });

    it('logs the interactive tree when verbose', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      setBody('<p>Intro</p><button>Go</button>');
      extractActionSpace(document, { verbose: true });
      expect(debug).toHaveBeenCalledWith('[Perception:extract] 1 affordances, 0 reused, 1 actions');
      expect(debug).toHaveBeenCalledWith('[Perception:extract] Interactive tree:\n<body>\n  [0] <button>\n    "Go"');
    });
  });

  describe('PerceptionSession', () => {
    it('starts empty', () => {
      const session = new PerceptionSession(document);
      expect(session.current).toBeNull();
      expect(session.resolve('B1')).toBeNull();
    });

    it('keeps the prior button ID and numbers an added button next', () => {
      setBody('<button>First</button><a href="/docs">Docs</a>');
      const session = new PerceptionSession(document);
      const before = session.snapshot().space;
      expect(before.ids()).toEqual(['B1', 'L1']);

      addButton('Second');
      const after = session.extend();
      expect(after.incremental).toBe(true);
      expect(after.space.ids()).toEqual(['B1', 'L1', 'B2']);
      expect(after.space.get('B1')).toEqual(before.get('B1'));
      expect(after.space.get('B2').description).toBe('Click "Second"');
    });

    it('never reuses the ID of a removed affordance', () => {
      setBody('<button>Keep</button><button id="drop">Drop</button>');
      const session = new PerceptionSession(document);
      session.snapshot();

      $('#drop').remove();
      const extra = document.createElement('div');
      extra.setAttribute('role', 'button');
      extra.textContent = 'Added';
      document.body.appendChild(extra);

      const { space } = session.extend();
      expect(space.ids()).toEqual(['B1', 'B3']);
      expect(space.get('B3').description).toBe('Click "Added"');
    });

    it('keeps a dropped ID retired across later extensions', () => {
      setBody('<button>Keep</button><button id="drop">Drop</button>');
      const session = new PerceptionSession(document);
      expect(session.snapshot().space.ids()).toEqual(['B1', 'B2']);

      $('#drop').remove();
      const shrunk = session.extend().space;
      expect(shrunk.ids()).toEqual(['B1']);
      expect(shrunk.counters).toEqual({ B: 2, L: 0, I: 0 });

      const extra = document.createElement('div');
      extra.setAttribute('role', 'button');
      extra.textContent = 'Added';
      document.body.appendChild(extra);

      const { space } = session.extend();
      expect(space.ids()).toEqual(['B1', 'B3']);
      expect(space.get('B3').description).toBe('Click "Added"');
      expect(session.resolve('B2')).toBeNull();
      expect(session.resolve('B3')).toBe(extra);
    });

    it('forgets IDs on a fresh snapshot', () => {
      setBody('<button>One</button>');
      const session = new PerceptionSession(document);
      session.snapshot();
      setBody('<a href="/x">X</a><button>One</button>');
      expect(session.snapshot().space.ids()).toEqual(['L1', 'B1']);
    });

    it('resolves IDs to connected elements', () => {
      setBody('<button>Go</button>');
      const session = new PerceptionSession(document);
      session.snapshot();
      const button = $('button');
      expect(session.resolve('B1')).toBe(button);
      expect(session.resolve('B2')).toBeNull();

      button.remove();
      expect(session.resolve('B1')).toBeNull();
    });

    it('applies session defaults under per-call options', () => {
      setBody('<button>Far</button>');
      setBox($('button'), { y: 5000 });
      const session = new PerceptionSession(document, { viewportExpansion: -1 });
      expect(session.snapshot().space.size).toBe(1);
      expect(session.snapshot({ viewportExpansion: 0 }).space.size).toBe(0);
    });

    it('clears state on reset', () => {
      setBody('<button>Go</button>');
      const session = new PerceptionSession(document);
      session.snapshot();
      session.reset();
      expect(session.current).toBeNull();
      expect(session.resolve('B1')).toBeNull();
    });
  });
});
