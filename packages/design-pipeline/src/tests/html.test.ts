/**
 * Tests for the HTML -> design node transform
 */

import { describe, it, expect, vi } from 'vitest';
import { parseHtml, HtmlParser } from '../pipeline/html';
import { imageHashFor } from '../utils/hash';

const BOOTSTRAP_HEAD = '<head><link rel="stylesheet" href="https://cdn.example.com/bootstrap.min.css"></head>';
const TAILWIND_HEAD = '<head><script src="https://cdn.example.com/tailwindcss.js"></script></head>';

describe('parseHtml: document root', () => {
  it('returns an empty body node when there is no <body>', () => {
    expect(parseHtml('<div class="p-3">hi</div>')).toEqual({
      tag: 'body',
      classes: [],
      text: null,
      attributes: {},
      styles: {},
      designStyles: {},
      framework: 'none',
      children: [],
    });
  });

  it('starts at <body> and keeps element order', () => {
    const root = parseHtml('<html><body><h1>a</h1><p>b</p><ul><li>c</li></ul></body></html>');
    expect(root.tag).toBe('body');
    expect(root.children.map(c => c.tag)).toEqual(['h1', 'p', 'ul']);
    expect(root.children[2].children[0].text).toBe('c');
  });

  it('tolerates unclosed tags', () => {
    const root = parseHtml('<body><div><p>one<p>two</div>');
    expect(root.children).toHaveLength(1);
    expect(root.children[0].children.map(c => c.text)).toEqual(['one', 'two']);
  });
});

describe('parseHtml: framework detection', () => {
  it('detects bootstrap from a stylesheet link', () => {
    const root = parseHtml(`<html>${BOOTSTRAP_HEAD}<body><div class="d-flex"></div></body></html>`);
    expect(root.framework).toBe('bootstrap');
    expect(root.children[0].framework).toBe('bootstrap');
  });

  it('detects tailwind from a script', () => {
    expect(parseHtml(`<html>${TAILWIND_HEAD}<body></body></html>`).framework).toBe('tailwind');
  });

  it('detects tailwind from a palette class', () => {
    const root = parseHtml('<body><p class="mt-2 text-gray-500 font-medium">a</p></body>');
    expect(root.framework).toBe('tailwind');
    expect(root.children[0].designStyles).toEqual({ fontWeight: 500 });
  });

  it('prefers bootstrap when both signal', () => {
    const root = parseHtml(`<html>${BOOTSTRAP_HEAD}<body><div class="bg-gray-100"></div></body></html>`);
    expect(root.framework).toBe('bootstrap');
  });

  it('does not carry a framework over to the next document', () => {
    const parser = new HtmlParser();
    expect(parser.parse(`<html>${BOOTSTRAP_HEAD}<body></body></html>`).framework).toBe('bootstrap');
    expect(parser.parse('<body><div></div></body>').framework).toBe('none');
  });
});

describe('parseHtml: styles', () => {
  it('resolves bootstrap classes', () => {
    const root = parseHtml(`<html>${BOOTSTRAP_HEAD}<body><div class="d-flex align-items-center p-3"></div></body></html>`);
    expect(root.children[0].designStyles).toEqual({
      layoutMode: 'HORIZONTAL',
      primaryAxisAlignItems: 'MIN',
      counterAxisAlignItems: 'CENTER',
      paddingTop: 16,
      paddingBottom: 16,
      paddingLeft: 16,
      paddingRight: 16,
    });
  });

  it('resolves tailwind widths to pixels', () => {
    const root = parseHtml(`<html>${TAILWIND_HEAD}<body><div class="w-24"></div></body></html>`);
    expect(root.children[0].designStyles).toEqual({ width: 96 });
  });

  it('keeps classes apart when an arbitrary value holds an unbalanced bracket', () => {
    const root = parseHtml(`<html>${TAILWIND_HEAD}<body><div class="before:content-['['] p-4 flex"></div></body></html>`);
    const div = root.children[0];
    expect(div.classes).toEqual(["before:content-['[']", 'p-4', 'flex']);
    expect(div.designStyles).toEqual({
      paddingTop: 16,
      paddingBottom: 16,
      paddingLeft: 16,
      paddingRight: 16,
      layoutMode: 'HORIZONTAL',
      primaryAxisAlignItems: 'MIN',
      counterAxisAlignItems: 'MIN',
    });
  });

  it('converts a bootstrap w-25 to 100px through the generic dimension pass', () => {
    const root = parseHtml(`<html>${BOOTSTRAP_HEAD}<body><span class="w-25">x</span></body></html>`);
    expect(root.children[0].designStyles).toEqual({ width: 100 });
  });

  it('applies inline styles when no framework is detected', () => {
    const root = parseHtml('<body><p style="color: #fff; font-size: 18px; line-height: 24px">x</p></body>');
    const p = root.children[0];
    expect(p.styles).toEqual({ color: '#fff', 'font-size': '18px', 'line-height': '24px' });
    expect(p.designStyles).toEqual({
      fontSize: 18,
      lineHeight: { unit: 'PIXELS', value: 24 },
      fills: [{ type: 'SOLID', color: { r: 1, g: 1, b: 1, a: 1 } }],
    });
  });

  it('lets the framework table replace inline and color-class styles', () => {
    const root = parseHtml(
      `<html>${BOOTSTRAP_HEAD}<body><p class="fw-bold text-primary" style="color: #fff; font-size: 18px">x</p></body></html>`
    );
    const p = root.children[0];
    expect(p.styles).toEqual({ color: '#fff', 'font-size': '18px' });
    expect(p.designStyles).toEqual({ fontWeight: 700 });
  });

  it('merges font classes over the table', () => {
    const root = parseHtml(`<html>${TAILWIND_HEAD}<body><p class="text-sm font-bold text-right">x</p></body></html>`);
    expect(root.children[0].designStyles).toEqual({ fontSize: 14, lineHeight: 20, fontWeight: 700, textAlign: 'RIGHT' });
  });

  it('keeps semantic text colors without a framework', () => {
    const root = parseHtml('<body><p class="text-textSecondary" style="color: rgb(255,0,0)">x</p></body>');
    expect(root.children[0].designStyles.fills).toEqual([
      { type: 'SOLID', color: { r: 1, g: 0, b: 0, a: 1 } },
      { type: 'SOLID', color: { r: 0.4, g: 0.4, b: 0.4 } },
    ]);
  });

  it('reports bad inline values through the warning sink', () => {
    const warn = vi.fn();
    const root = parseHtml('<body><p style="font-size: large; text-align: center">x</p></body>', { warn });
    expect(root.children[0].designStyles).toEqual({ textAlign: 'CENTER' });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('failed to convert font-size', expect.objectContaining({ value: 'large' }));
  });
});

describe('parseHtml: images', () => {
  it('adds layout hints and sizes without a framework', () => {
    const root = parseHtml('<body><img src="/a.png" class="w-24 h-10" alt="A"></body>');
    const img = root.children[0];
    expect(img.attributes).toEqual({ src: '/a.png', alt: 'A' });
    expect(img.designStyles).toEqual({
      imageHash: imageHashFor('/a.png'),
      width: 96,
      height: 40,
      constraints: { horizontal: 'SCALE', vertical: 'SCALE' },
      layoutMode: 'NONE',
    });
  });

  it('loses the image hints to the bootstrap table', () => {
    const root = parseHtml(`<html>${BOOTSTRAP_HEAD}<body><img src="x.png" class="w-25"></body></html>`);
    expect(root.children[0].designStyles).toEqual({ width: 100 });
  });

  it('combines the tailwind table with the generic height pass', () => {
    const root = parseHtml(`<html>${TAILWIND_HEAD}<body><img class="w-full h-24" src="p.jpg"></body></html>`);
    expect(root.children[0].designStyles).toEqual({
      constraints: { horizontal: 'SCALE', vertical: 'SCALE' },
      minWidth: 0,
      height: 96,
    });
  });
});

describe('parseHtml: text and attributes', () => {
  it('keeps the last text child', () => {
    const root = parseHtml('<body><p>first<b>bold</b>last</p></body>');
    const p = root.children[0];
    expect(p.text).toBe('last');
    expect(p.children[0].text).toBe('bold');
  });

  it('overwrites wrapped text with a later text child', () => {
    const root = parseHtml('<body><div><span>inner</span> tail </div></body>');
    expect(root.children[0].text).toBe('tail');
  });

  it('lifts single-string content through wrapper elements', () => {
    const root = parseHtml('<body><div><span>inner</span></div></body>');
    expect(root.text).toBe('inner');
    expect(root.children[0].text).toBe('inner');
  });

  it('leaves blank elements without text', () => {
    expect(parseHtml('<body><p>   </p></body>').children[0].text).toBeNull();
  });

  it('ignores comments', () => {
    const p = parseHtml('<body><p><!-- note -->text</p></body>').children[0];
    expect(p.text).toBe('text');
    expect(p.children).toEqual([]);
  });

  it('decodes entities', () => {
    expect(parseHtml('<body><p>a &amp; b</p></body>').children[0].text).toBe('a & b');
  });

  it('splits classes and drops the class attribute', () => {
    const a = parseHtml('<body><a href="/x" class=" btn  btn-primary " data-id="7">go</a></body>').children[0];
    expect(a.classes).toEqual(['btn', 'btn-primary']);
    expect(a.attributes).toEqual({ href: '/x', 'data-id': '7' });
    expect(a.styles).toEqual({});
  });
});
