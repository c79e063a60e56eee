import test from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { extractIdentifiers, extractProfileMatches } from '../pageExtractor';
import { SerpResultPage } from '../types';

const fixture = (name: string): { results: SerpResultPage[] } =>
  JSON.parse(readFileSync(join(process.cwd(), 'src', 'adapters', '__fixtures__', name), 'utf8'));

const organicPage = (entries: unknown[]): SerpResultPage => ({ content: { results: { organic: entries } } });

test('collapses url variants of the same profile within a page', () => {
  const [page] = fixture('oxylabs.response.json').results;
  assert.deepEqual([...extractIdentifiers(page)], ['jane-doe-123']);
});

test('keeps the first url each identifier was found at', () => {
  const [page] = fixture('oxylabs.response.json').results;
  assert.deepEqual(extractProfileMatches(page), [
    { identifier: 'jane-doe-123', url: 'https://www.linkedin.com/in/jane-doe-123' },
  ]);
});

test('skips malformed entries without throwing', () => {
  const page = organicPage([
    null,
    'https://linkedin.com/in/not-an-entry',
    { url: 42 },
    { url: '' },
    { url: '   ' },
    { title: 'no url' },
    { url: 'https://linkedin.com/in/john-q-public' },
  ]);
  assert.deepEqual([...extractIdentifiers(page)], ['john-q-public']);
});

test('returns an empty set for pages without organic results', () => {
  assert.equal(extractIdentifiers({}).size, 0);
  assert.equal(extractIdentifiers({ content: { results: {} } }).size, 0);
  assert.equal(extractIdentifiers({ content: { results: { organic: 'nope' } } }).size, 0);
  assert.equal(extractIdentifiers({ content: 12 }).size, 0);
});

test('preserves first-seen order across distinct profiles', () => {
  const page = organicPage([
    { url: 'https://linkedin.com/in/b-person' },
    { url: 'https://linkedin.com/in/a-person' },
    { url: 'https://www.linkedin.com/in/b-person/' },
  ]);
  assert.deepEqual([...extractIdentifiers(page)], ['b-person', 'a-person']);
});

test('falls back to html anchors when the page was not parsed', () => {
  const html = [
    '<html><body>',
    '<a href="/url?q=https://www.linkedin.com/in/jane-doe-123&amp;sa=U">Jane</a>',
    '<a href="https://linkedin.com/in/john-q-public">John</a>',
    '<a href="https://example.com/team">Team</a>',
    '</body></html>',
  ].join('');
  assert.deepEqual([...extractIdentifiers({ content: html })], ['jane-doe-123', 'john-q-public']);
});
