import * as test from 'node:test';
import * as assert from 'node:assert';
import request from 'supertest';
import { createApp } from '../server.js';
import { LoadResult } from '../loader.js';
import { buildIndex } from './fixtures.js';

const { describe, it } = test;

function loadResult(): LoadResult {
  const prototypes = buildIndex(
    { id: 'BaseItem', abstract: true, components: [{ type: 'Item', size: 'Small' }, { type: 'Sprite', sprite: 'base.rsi' }] },
    { id: 'Wrench', parent: 'BaseItem', components: [{ type: 'Item', size: 'Small' }, { type: 'Sprite', sprite: 'base.rsi', state: 'icon' }] },
    { id: 'LoopA', parent: 'LoopB', components: [{ type: 'Item' }] },
    { id: 'LoopB', parent: 'LoopA' }
  );
  const sources = new Map(Array.from(prototypes.keys(), (id): [string, string] => [id, id.startsWith('Loop') ? 'loops.yml' : 'items.yml']));
  return { prototypes, sources, files: ['items.yml', 'loops.yml'], errors: [] };
}

describe('prototype API', () => {
  const app = createApp(loadResult());

  it('should report health', async () => {
    const res = await request(app).get('/health');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { status: 'ok', prototypes: 4, files: 2 });
  });

  it('should list prototypes sorted by id', async () => {
    const res = await request(app).get('/api/prototypes?limit=2');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, [
      { id: 'BaseItem', sourceFile: 'items.yml' },
      { id: 'LoopA', sourceFile: 'loops.yml' }
    ]);
  });

  it('should return a stored prototype as JSON', async () => {
    const res = await request(app).get('/api/prototype/BaseItem');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, {
      type: 'entity',
      id: 'BaseItem',
      abstract: true,
      components: [{ type: 'Item', size: 'Small' }, { type: 'Sprite', sprite: 'base.rsi' }]
    });
  });

  it('should return 404 for an unknown prototype', async () => {
    const res = await request(app).get('/api/prototype/Nope');

    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(res.body, { error: 'Prototype not found: Nope' });
  });

  it('should list inherited components by type', async () => {
    const res = await request(app).get('/api/prototype/Wrench/ancestors');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, {
      Item: [{ type: 'Item', size: 'Small' }],
      Sprite: [{ type: 'Sprite', sprite: 'base.rsi' }]
    });
  });

  it('should return 422 for a parent cycle', async () => {
    const res = await request(app).get('/api/prototype/LoopA/ancestors');

    assert.strictEqual(res.status, 422);
    assert.deepStrictEqual(res.body, { error: 'Inheritance cycle: LoopA -> LoopB -> LoopA' });
  });

  it('should keep a component type named __proto__', async () => {
    const prototypes = buildIndex(
      { id: 'Odd', components: [{ type: '__proto__', flag: true }] },
      { id: 'OddChild', parent: 'Odd' }
    );
    const oddApp = createApp({ prototypes, sources: new Map(), files: [], errors: [] });

    const res = await request(oddApp).get('/api/prototype/OddChild/ancestors');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(Object.keys(res.body), ['__proto__']);
    assert.deepStrictEqual(res.body['__proto__'], [{ type: '__proto__', flag: true }]);
  });

  it('should return the sanitized prototype as YAML', async () => {
    const res = await request(app).get('/api/sanitize/Wrench');

    assert.strictEqual(res.status, 200);
    assert.match(res.headers['content-type'], /^text\/yaml/);
    assert.strictEqual(res.text, `- type: entity
  parent: BaseItem
  id: Wrench
  components:
  - type: Sprite
    state: icon
`);
  });

  it('should return the sanitized prototype and report as JSON', async () => {
    const res = await request(app).get('/api/sanitize/Wrench?format=json');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, {
      document: {
        type: 'entity',
        parent: 'BaseItem',
        id: 'Wrench',
        components: [{ type: 'Sprite', state: 'icon' }]
      },
      report: {
        removedComponents: ['Item'],
        strippedFields: [{ componentType: 'Sprite', fields: ['sprite'] }],
        unresolvedParents: []
      }
    });
  });

  it('should return 404 when sanitizing an unknown prototype', async () => {
    const res = await request(app).get('/api/sanitize/Nope');

    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(res.body, { error: "Prototype 'Nope' not found" });
  });
});
