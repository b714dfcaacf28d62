import { describe, it, expect } from 'vitest';
import { formatSnapshot } from '../snapshot-formatter.js';
import type { ElementSnapshotNode, SnapshotNode } from '../types/snapshot.js';

function element(tag: string, overrides: Partial<ElementSnapshotNode> = {}): ElementSnapshotNode {
  return {
    kind: 'element',
    tag,
    attributes: {},
    path: tag,
    children: [],
    isInteractive: false,
    isVisible: true,
    isTopmost: true,
    isEditable: false,
    ...overrides,
  };
}

function text(value: string): SnapshotNode {
  return { kind: 'text', text: value, path: 'text()' };
}

describe('formatSnapshot', () => {
  it('formats a single element', () => {
    expect(formatSnapshot(element('div'))).toBe('<div>');
  });

  it('formats highlight index and id attribute', () => {
    const node = element('button', { highlightIndex: 3, attributes: { id: 'save', class: 'primary' } });
    expect(formatSnapshot(node)).toBe('[3] <button id="save">');
  });

  it('marks boundaries and hidden nodes', () => {
    const node = element('body', { boundary: 'frame', isVisible: false });
    expect(formatSnapshot(node)).toBe('<body> (frame) (hidden)');
  });

  it('formats nested tree', () => {
    const tree = element('body', {
      children: [
        element('nav', { children: [element('a', { highlightIndex: 0, children: [text('Home')] })] }),
        text('Welcome'),
      ],
    });
    expect(formatSnapshot(tree).split('\n')).toEqual([
      '<body>',
      '  <nav>',
      '    [0] <a>',
      '      "Home"',
      '  "Welcome"',
    ]);
  });

  it('applies the starting indent', () => {
    expect(formatSnapshot(element('p'), {}, 2)).toBe('    <p>');
  });
});

describe('formatSnapshot interactiveOnly', () => {
  it('keeps highlighted nodes, their ancestors and their text', () => {
    const tree = element('body', {
      children: [
        element('header', { children: [element('h1', { children: [text('Title')] })] }),
        element('form', {
          children: [
            text('Intro'),
            element('button', { highlightIndex: 0, children: [text('Send')] }),
          ],
        }),
      ],
    });
    expect(formatSnapshot(tree, { interactiveOnly: true }).split('\n')).toEqual([
      '<body>',
      '  <form>',
      '    [0] <button>',
      '      "Send"',
    ]);
  });

  it('keeps a highlighted leaf and drops empty unhighlighted siblings', () => {
    const tree = element('body', {
      children: [element('div'), element('input', { highlightIndex: 2 })],
    });
    expect(formatSnapshot(tree, { interactiveOnly: true }).split('\n')).toEqual(['<body>', '  [2] <input>']);
  });

  it('returns empty string when nothing is highlighted', () => {
    const tree = element('body', { children: [element('p', { children: [text('Plain')] })] });
    expect(formatSnapshot(tree, { interactiveOnly: true })).toBe('');
  });
});
