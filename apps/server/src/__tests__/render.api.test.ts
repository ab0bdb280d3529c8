import assert from 'node:assert/strict';
import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, it } from 'node:test';
import type { Express } from 'express';

import { createApp } from '../app.js';
import { loadConfig } from '../config.js';

type JsonValue = Record<string, unknown> | string | number | boolean | null | undefined;

interface RequestOptions {
  method?: string;
  body?: unknown;
  rawBody?: string;
}

class ApiClient {
  private constructor(
    private readonly server: Server,
    private readonly baseUrl: string,
  ) {}

  static async start(app: Express): Promise<ApiClient> {
    const server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (typeof address !== 'object' || address === null) {
      throw new Error('Server is not listening on a TCP port');
    }
    return new ApiClient(server, `http://127.0.0.1:${address.port}`);
  }

  async request(pathname: string, options: RequestOptions = {}) {
    const { method = 'GET', body, rawBody } = options;
    const payload = rawBody ?? (body === undefined ? undefined : JSON.stringify(body));
    const response = await fetch(`${this.baseUrl}${pathname}`, {
      method,
      headers: payload === undefined ? {} : { 'content-type': 'application/json' },
      body: payload,
    });
    const text = await response.text();
    let parsed: JsonValue = text;
    try {
      parsed = text ? (JSON.parse(text) as JsonValue) : undefined;
    } catch {
      parsed = text;
    }
    return { status: response.status, contentType: response.headers.get('content-type'), body: parsed };
  }

  async close() {
    await new Promise<void>((resolve, reject) => {
      this.server.close((error?: Error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
}

const erdDefinition = {
  entities: [{ id: 'album', attributes: [{ type: 'int', name: 'albumId', primaryKey: true }] }],
  relationships: [
    { left: 'album', right: 'song', leftCardinality: 'ExactlyOne', rightCardinality: 'ZeroOrMore' },
  ],
};

const erdText = [
  'erDiagram',
  '    %% Entities start',
  '    ALBUM {',
  '        int albumId PK',
  '    }',
  '    SONG',
  '    %% Entities end',
  '    %% Relationships start',
  '    ALBUM ||--o{ SONG',
  '    %% Relationships end',
].join('\n');

let client: ApiClient;

describe('render API', () => {
  beforeEach(async () => {
    client = await ApiClient.start(createApp(loadConfig({})));
  });

  afterEach(async () => {
    await client.close();
  });

  it('reports health', async () => {
    const response = await client.request('/api/health');
    assert.equal(response.status, 200);
    assert.deepEqual(response.body, { status: 'ok' });
  });

  it('renders an ERD definition', async () => {
    const response = await client.request('/api/erd/render', { method: 'POST', body: erdDefinition });
    assert.equal(response.status, 200, JSON.stringify(response.body));
    assert.deepEqual(response.body, { type: 'erDiagram', text: erdText });
  });

  it('answers plain text when asked to', async () => {
    const response = await client.request('/api/erd/render?format=text', {
      method: 'POST',
      body: erdDefinition,
    });
    assert.equal(response.status, 200);
    assert.ok(response.contentType?.startsWith('text/plain'));
    assert.equal(response.body, erdText);
  });

  it('rejects invalid ERD definitions', async () => {
    const response = await client.request('/api/erd/render', {
      method: 'POST',
      body: { entities: [{ alias: 'no id' }] },
    });
    assert.equal(response.status, 400);
    const details = response.body as { message?: string; details?: string };
    assert.equal(details.message, 'Invalid ERD definition');
    assert.ok(String(details.details).includes('Invalid ERD definition: '));
  });

  it('renders a requirement diagram definition', async () => {
    const response = await client.request('/api/requirements/render', {
      method: 'POST',
      body: {
        elements: [{ name: 'brief', kind: 'document' }],
        requirements: [{ kind: 'Functional', name: 'login', id: '1', text: 'Users sign in' }],
        relationships: [{ source: 'brief', target: 'login', kind: 'Derives' }],
      },
    });
    assert.equal(response.status, 200, JSON.stringify(response.body));
    assert.deepEqual(response.body, {
      type: 'requirementDiagram',
      text: [
        'requirementDiagram',
        '    %% Elements start',
        '    element brief {',
        '        type: "document"',
        '    }',
        '    %% Elements end',
        '    %% Requirements start',
        '    functionalRequirement login {',
        '        id: 1',
        '        text: "Users sign in"',
        '    }',
        '    %% Requirements end',
        '    %% Relationships start',
        '    brief - derives -> login',
        '    %% Relationships end',
      ].join('\n'),
    });
  });

  it('rejects invalid requirement diagram definitions', async () => {
    const response = await client.request('/api/requirements/render', {
      method: 'POST',
      body: { requirements: [{ name: 'login', id: '1', risk: 'Severe' }] },
    });
    assert.equal(response.status, 400);
    assert.equal((response.body as { message?: string }).message, 'Invalid requirement diagram definition');
  });

  it('reports relationships to unknown nodes', async () => {
    const response = await client.request('/api/requirements/render', {
      method: 'POST',
      body: { relationships: [{ source: 'Fake', target: 'bar', kind: 'Satisfies' }] },
    });
    assert.equal(response.status, 422);
    assert.deepEqual(response.body, {
      message: 'Relationship references an unknown node',
      details: "Error: Fake isn't found in the list of elements or requirements",
      nodeName: 'Fake',
    });
  });

  it('rejects malformed JSON bodies', async () => {
    const response = await client.request('/api/erd/render', { method: 'POST', rawBody: '{"entities": [' });
    assert.equal(response.status, 400);
    assert.equal((response.body as { message?: string }).message, 'Render failed');
  });
});
