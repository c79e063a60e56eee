import test from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { SerpRequestError } from '../../core/errors';
import { DEFAULT_SERP_OPTIONS } from '../../core/harvester';
import { SerpSearchRequest } from '../../core/types';
import { buildPayload, OxylabsSerpClient } from '../oxylabs';
import { stubHttp } from './httpStub';

const fixture = (name: string): unknown => JSON.parse(readFileSync(join(process.cwd(), 'src', 'adapters', '__fixtures__', name), 'utf8'));

const REQUEST: SerpSearchRequest = {
  text: 'site:example.com mayor',
  startPage: 3,
  pagesPerRun: 2,
  options: DEFAULT_SERP_OPTIONS,
};

const CREDENTIALS = { username: 'test-user', password: 'test-secret' };

test('builds the google_search payload from the request', () => {
  assert.deepEqual(buildPayload(REQUEST), {
    source: 'google_search',
    query: 'site:example.com mayor',
    start_page: 3,
    pages: 2,
    locale: 'en-us',
    user_agent_type: 'desktop_chrome',
    parse: true,
    limit: 100,
    context: [
      { key: 'filter', value: 1 },
      { key: 'results_language', value: 'en' },
      { key: 'safe_search', value: true },
      { key: 'nfpr', value: true },
    ],
  });
});

test('posts the payload with basic auth and returns the results array', async () => {
  const stub = stubHttp(() => ({ status: 200, data: fixture('oxylabs.response.json') }));
  const client = new OxylabsSerpClient(CREDENTIALS, { endpoint: 'https://serp.test/v1/queries', http: stub.http });

  const response = await client.search(REQUEST);

  assert.equal(stub.calls.length, 1);
  const [call] = stub.calls;
  assert.equal(call.method, 'post');
  assert.equal(call.url, 'https://serp.test/v1/queries');
  assert.deepEqual(call.auth, CREDENTIALS);
  assert.equal(JSON.parse(String(call.data)).start_page, 3);
  assert.equal(response.results.length, 1);
  assert.equal(response.results[0].status_code, 200);
});

test('a non-success status carries the status and body', async () => {
  const stub = stubHttp(() => ({ status: 401, data: { message: 'Unauthorized' } }));
  const client = new OxylabsSerpClient(CREDENTIALS, { http: stub.http });

  await assert.rejects(client.search(REQUEST), (error: unknown) => {
    assert.ok(error instanceof SerpRequestError);
    assert.equal(error.kind, 'status');
    assert.equal(error.status, 401);
    assert.equal(error.body, '{"message":"Unauthorized"}');
    return true;
  });
});

test('a transport failure is reported as such', async () => {
  const stub = stubHttp(() => {
    throw new Error('connect ECONNREFUSED');
  });
  const client = new OxylabsSerpClient(CREDENTIALS, { http: stub.http });

  await assert.rejects(client.search(REQUEST), (error: unknown) => {
    assert.ok(error instanceof SerpRequestError);
    assert.equal(error.kind, 'transport');
    assert.equal(error.message, 'serp request failed: connect ECONNREFUSED');
    return true;
  });
});

test('a success response without results is malformed', async () => {
  const stub = stubHttp(() => ({ status: 200, data: { job: { status: 'faulted' } } }));
  const client = new OxylabsSerpClient(CREDENTIALS, { http: stub.http });

  await assert.rejects(client.search(REQUEST), (error: unknown) => error instanceof SerpRequestError && error.kind === 'malformed');
});
