import test from 'node:test';
import assert from 'node:assert/strict';
import { isProfileIdentifier, normalizeProfileUrl, profileUrlFor } from '../identifierNormalizer';

test('extracts the slug from a canonical profile url', () => {
  assert.equal(normalizeProfileUrl('https://www.linkedin.com/in/jane-doe-123'), 'jane-doe-123');
});

test('ignores a trailing slash and deeper path segments', () => {
  assert.equal(normalizeProfileUrl('https://linkedin.com/in/jane-doe-123/'), 'jane-doe-123');
  assert.equal(normalizeProfileUrl('https://www.linkedin.com/in/jane_doe/details/experience/'), 'jane_doe');
});

test('matches case-insensitively and without a scheme', () => {
  assert.equal(normalizeProfileUrl('HTTPS://WWW.LINKEDIN.COM/IN/Jane-Doe'), 'Jane-Doe');
  assert.equal(normalizeProfileUrl('linkedin.com/in/john-q-public'), 'john-q-public');
  assert.equal(normalizeProfileUrl('www.linkedin.com/in/john-q-public'), 'john-q-public');
});

test('strips characters outside the identifier whitelist', () => {
  assert.equal(normalizeProfileUrl('https://www.linkedin.com/in/jos%C3%A9-garc%C3%ADa'), 'josC3A9-garcC3ADa');
  assert.equal(normalizeProfileUrl('https://www.linkedin.com/in/jane.doe'), 'janedoe');
});

test('stops the slug at whitespace', () => {
  assert.equal(normalizeProfileUrl('see https://linkedin.com/in/jane-doe for more'), 'jane-doe');
});

test('returns null for urls that are not person profiles', () => {
  assert.equal(normalizeProfileUrl('https://www.linkedin.com/company/acme'), null);
  assert.equal(normalizeProfileUrl('https://example.com/in/jane-doe'), null);
  assert.equal(normalizeProfileUrl('https://www.linkedin.com/in/'), null);
  assert.equal(normalizeProfileUrl(''), null);
});

test('rejects hosts that only end in the profile domain', () => {
  assert.equal(normalizeProfileUrl('https://notlinkedin.com/in/jane-doe'), null);
  assert.equal(normalizeProfileUrl('https://evil-linkedin.com/in/jane-doe'), null);
  assert.equal(normalizeProfileUrl('https://example.com/fakelinkedin.com/in/jane-doe'), null);
  assert.equal(normalizeProfileUrl('notlinkedin.com/in/jane-doe'), null);
});

test('returns null when stripping leaves nothing', () => {
  assert.equal(normalizeProfileUrl('https://www.linkedin.com/in/%%%'), null);
  assert.equal(normalizeProfileUrl('https://www.linkedin.com/in/...'), null);
});

test('normalized identifiers only use the whitelist', () => {
  const urls = [
    'https://www.linkedin.com/in/a.b+c',
    'https://linkedin.com/in/x_y-z?trk=public',
    'http://www.linkedin.com/in/%E2%9C%93ok',
  ];
  for (const url of urls) {
    const identifier = normalizeProfileUrl(url);
    assert.ok(identifier);
    assert.ok(isProfileIdentifier(identifier));
  }
});

test('builds the canonical profile url for an identifier', () => {
  assert.equal(profileUrlFor('jane-doe-123'), 'https://www.linkedin.com/in/jane-doe-123');
  assert.equal(isProfileIdentifier(''), false);
  assert.equal(isProfileIdentifier('jane doe'), false);
});
