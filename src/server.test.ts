import assert from 'node:assert/strict';
import http from 'node:http';
import net from 'node:net';
import { Readable } from 'node:stream';
import test from 'node:test';
import { HttpError } from './errors.ts';
import { headersFromIncoming, readBody, rejectionResponse, toFetchRequest } from './server.ts';

function incoming(method: string, url: string, headers: http.IncomingHttpHeaders): http.IncomingMessage {
  const req = new http.IncomingMessage(new net.Socket());
  req.method = method;
  req.url = url;
  req.headers = headers;
  return req;
}

test('incoming headers are copied and repeated values joined', () => {
  const headers = headersFromIncoming({
    'user-agent': 'test-agent',
    'x-forwarded-for': ['203.0.113.1', '203.0.113.2'],
    'x-absent': undefined,
  });

  assert.equal(headers.get('user-agent'), 'test-agent');
  assert.equal(headers.get('x-forwarded-for'), '203.0.113.1, 203.0.113.2');
  assert.equal(headers.has('x-absent'), false);
});

test('post bodies become fetch request bodies', async () => {
  const req = incoming('POST', '/check-in?via=test', { host: 'service.test', 'content-type': 'application/json' });

  const request = toFetchRequest(req, Buffer.from('{"adherence":90}'));

  assert.equal(request.method, 'POST');
  assert.equal(request.url, 'http://localhost/check-in?via=test');
  assert.equal(request.headers.get('content-type'), 'application/json');
  assert.deepEqual(JSON.parse(await request.text()), { adherence: 90 });
});

test('get requests carry no body', () => {
  const request = toFetchRequest(incoming('GET', '/healthz', {}), Buffer.alloc(0));

  assert.equal(request.url, 'http://localhost/healthz');
  assert.equal(request.body, null);
});

test('a malformed host header does not affect the request url', () => {
  const request = toFetchRequest(incoming('GET', '/healthz', { host: 'bad host[' }), Buffer.alloc(0));

  assert.equal(request.url, 'http://localhost/healthz');
});

test('an unparseable request target is refused with 400', () => {
  assert.throws(
    () => toFetchRequest(incoming('GET', '//bad host/healthz', {}), Buffer.alloc(0)),
    (error: unknown) => error instanceof HttpError && error.status === 400 && error.code === 'E_BAD_REQUEST',
  );
});

test('bodies within the cap are collected whole', async () => {
  const body = await readBody(Readable.from([Buffer.from('{"a":'), '1}']), 16);

  assert.equal(body.toString('utf8'), '{"a":1}');
});

test('bodies over the cap are refused with 413 after draining', async () => {
  const chunks = [Buffer.alloc(40_000), Buffer.alloc(40_000)];
  const source = Readable.from(chunks);

  await assert.rejects(readBody(source, 64 * 1024), (error: unknown) => {
    assert.ok(error instanceof HttpError);
    assert.equal(error.status, 413);
    assert.equal(error.code, 'E_PAYLOAD_TOO_LARGE');
    assert.equal(error.message, 'Request body exceeds 65536 bytes');
    return true;
  });
  assert.equal(source.readableEnded, true);
});

test('refused requests get a standard error body', async () => {
  const error = new HttpError(413, 'E_PAYLOAD_TOO_LARGE', 'Payload Too Large', 'Request body exceeds 10 bytes');

  const response = rejectionResponse(error, 'https://docs.test/api');

  assert.equal(response.status, 413);
  const body = JSON.parse(await response.text());
  assert.deepEqual(body.error, {
    code: 'E_PAYLOAD_TOO_LARGE',
    type: 'https://docs.test/api/errors/payload-too-large',
    title: 'Payload Too Large',
    detail: 'Request body exceeds 10 bytes',
    help_url: 'https://docs.test/api/troubleshooting#payload_too_large',
  });
  assert.equal(body.meta.request_id, response.headers.get('x-request-id'));
});
