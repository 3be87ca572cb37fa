import http from 'node:http';
import { once } from 'node:events';

import { GatewayError, type Result } from '@record-tree/core';

import { createNullLogger } from '../logging/logger';
import { CloudflareGateway } from './cloudflare-gateway';

interface RecordedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

type Handler = (request: RecordedRequest, response: http.ServerResponse) => void;

async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

function sendJson(response: http.ServerResponse, status: number, payload: unknown): void {
  response.statusCode = status;
  response.setHeader('Content-Type', 'application/json');
  response.end(JSON.stringify(payload));
}

function envelope(result: unknown, resultInfo?: unknown) {
  return { success: true, errors: [], messages: [], result, result_info: resultInfo };
}

function expectError<T>(result: Result<T, GatewayError>): GatewayError {
  if (result.ok) {
    throw new Error('expected a failed result');
  }
  return result.error;
}

const apexRecord = {
  id: 'rec-1',
  zone_id: 'zone-1',
  name: 'example.com',
  type: 'A',
  content: '1.1.1.1',
  ttl: 1,
  proxied: true,
};

const mxRecord = {
  id: 'rec-2',
  name: 'example.com',
  type: 'MX',
  content: 'mail.example.com',
  ttl: 300,
  priority: 10,
  comment: 'primary',
};

describe('CloudflareGateway', () => {
  const requests: RecordedRequest[] = [];
  let handler: Handler = (_request, response) => sendJson(response, 404, {});
  let server: http.Server;
  let baseUrl = '';

  const createGateway = (timeoutMs = 0) =>
    new CloudflareGateway({
      baseUrl,
      token: 'test-token',
      logger: createNullLogger(),
      timeoutMs,
      zonesPerPage: 1,
      userAgent: 'record-tree/test',
    });

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      readBody(req)
        .then((body) => {
          const recorded = {
            method: req.method ?? '',
            url: req.url ?? '',
            headers: req.headers,
            body,
          };
          requests.push(recorded);
          handler(recorded, res);
        })
        .catch(() => {
          res.statusCode = 500;
          res.end();
        });
    });
    server.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('server is not listening on a port');
    }
    baseUrl = `http://127.0.0.1:${address.port}/client/v4/`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    server.close();
    await once(server, 'close');
  });

  beforeEach(() => {
    requests.length = 0;
  });

  it('follows the zone list across pages', async () => {
    handler = (request, response) => {
      const page = new URL(request.url, 'http://localhost').searchParams.get('page');
      const zone =
        page === '1' ? { id: 'zone-1', name: 'example.com' } : { id: 'zone-2', name: 'example.org' };
      sendJson(response, 200, envelope([zone], { page: Number(page), per_page: 1, total_pages: 2 }));
    };

    const result = await createGateway().listParents();

    expect(result).toEqual({
      ok: true,
      value: [
        { id: 'zone-1', name: 'example.com' },
        { id: 'zone-2', name: 'example.org' },
      ],
    });
    expect(requests.map((request) => request.url)).toEqual([
      '/client/v4/zones?page=1&per_page=1',
      '/client/v4/zones?page=2&per_page=1',
    ]);
    expect(requests[0]?.headers.authorization).toBe('Bearer test-token');
    expect(requests[0]?.headers['user-agent']).toBe('record-tree/test');
  });

  it('maps dns records onto child resources', async () => {
    handler = (_request, response) => {
      sendJson(
        response,
        200,
        envelope([apexRecord, mxRecord], { page: 1, total_pages: 1 }),
      );
    };

    const result = await createGateway().listChildren('zone-1');

    expect(requests[0]?.url).toBe('/client/v4/zones/zone-1/dns_records?page=1&per_page=100');
    expect(result).toEqual({
      ok: true,
      value: [
        {
          id: 'rec-1',
          parentId: 'zone-1',
          name: 'example.com',
          type: 'A',
          content: '1.1.1.1',
          ttl: 1,
          proxied: true,
          priority: undefined,
          comment: null,
        },
        {
          id: 'rec-2',
          parentId: 'zone-1',
          name: 'example.com',
          type: 'MX',
          content: 'mail.example.com',
          ttl: 300,
          proxied: false,
          priority: 10,
          comment: 'primary',
        },
      ],
    });
  });

  it('sends updates as JSON', async () => {
    handler = (_request, response) => {
      sendJson(response, 200, envelope({ ...apexRecord, content: '2.2.2.2', ttl: 600 }));
    };

    const result = await createGateway().updateChild('zone-1', 'rec-1', {
      type: 'A',
      name: 'example.com',
      content: '2.2.2.2',
      ttl: 600,
      proxied: true,
    });

    expect(requests[0]?.method).toBe('PUT');
    expect(requests[0]?.url).toBe('/client/v4/zones/zone-1/dns_records/rec-1');
    expect(requests[0]?.headers['content-type']).toBe('application/json');
    expect(JSON.parse(requests[0]?.body ?? '')).toEqual({
      type: 'A',
      name: 'example.com',
      content: '2.2.2.2',
      ttl: 600,
      proxied: true,
    });
    expect(result.ok && result.value.content).toBe('2.2.2.2');
  });

  it('creates and deletes records', async () => {
    handler = (request, response) => {
      if (request.method === 'POST') {
        sendJson(response, 200, envelope({ ...apexRecord, id: 'rec-9', type: 'MX', priority: 5 }));
        return;
      }
      sendJson(response, 200, envelope({ id: 'rec-9' }));
    };
    const gateway = createGateway();

    const created = await gateway.createChild('zone-1', {
      type: 'MX',
      name: 'example.com',
      content: '1.1.1.1',
      ttl: 1,
      proxied: true,
      priority: 5,
    });
    const deleted = await gateway.deleteChild('zone-1', 'rec-9');

    expect(JSON.parse(requests[0]?.body ?? '')).toMatchObject({ priority: 5 });
    expect(created.ok && created.value.id).toBe('rec-9');
    expect(requests[1]?.method).toBe('DELETE');
    expect(requests[1]?.url).toBe('/client/v4/zones/zone-1/dns_records/rec-9');
    expect(deleted).toEqual({ ok: true, value: undefined });
  });

  it('reports the first api error with its status and code', async () => {
    handler = (_request, response) => {
      sendJson(response, 403, {
        success: false,
        errors: [{ code: 10000, message: 'Authentication error' }],
        messages: [],
        result: null,
      });
    };

    const error = expectError(await createGateway().listParents());

    expect(error).toBeInstanceOf(GatewayError);
    expect(error.message).toBe('Authentication error');
    expect(error.status).toBe(403);
    expect(error.code).toBe('10000');
  });

  it('treats an unsuccessful envelope as an error', async () => {
    handler = (_request, response) => {
      sendJson(response, 200, {
        success: false,
        errors: [{ code: 81057, message: 'Record already exists.' }],
        result: null,
      });
    };

    const error = expectError(
      await createGateway().createChild('zone-1', {
        type: 'A',
        name: 'example.com',
        content: '1.1.1.1',
        ttl: 1,
        proxied: true,
      }),
    );

    expect(error.message).toBe('Record already exists.');
    expect(error.status).toBe(200);
    expect(error.code).toBe('81057');
  });

  it('falls back to the status text without an error body', async () => {
    handler = (_request, response) => {
      response.statusCode = 502;
      response.end('<html>bad gateway</html>');
    };

    const error = expectError(await createGateway().listChildren('zone-1'));

    expect(error.message).toBe('Bad Gateway');
    expect(error.status).toBe(502);
  });

  it('rejects bodies that do not match the envelope', async () => {
    handler = (_request, response) => {
      sendJson(response, 200, { result: [] });
    };

    const error = expectError(await createGateway().listParents());

    expect(error.message).toBe('Unexpected response');
    expect(error.status).toBe(200);
  });

  it('gives up after the timeout', async () => {
    handler = (_request, response) => {
      setTimeout(() => sendJson(response, 200, envelope([])), 500);
    };

    const error = expectError(await createGateway(20).listParents());

    expect(error.message).toBe('Request timed out');
    expect(error.code).toBe('TIMEOUT');
  });

  it('stops when the caller aborts', async () => {
    handler = () => undefined;
    const controller = new AbortController();

    const pending = createGateway().listParents({ signal: controller.signal });
    controller.abort();
    const error = expectError(await pending);

    expect(error.message).toBe('Request aborted');
    expect(error.code).toBe('ABORTED');
  });
});
