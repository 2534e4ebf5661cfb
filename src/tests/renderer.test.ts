import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { renderPrototypes, writePrototypes } from '../renderer.js';
import { parsePrototypes } from '../parser.js';
import { node } from './fixtures.js';

const { describe, it, beforeEach, afterEach } = test;

describe('renderPrototypes', () => {

  it('should write a block sequence with flush nested sequences', () => {
    const prototype = node({
      type: 'entity',
      id: 'Crate',
      components: [{ type: 'Sprite', layers: [{ state: 'closed' }] }]
    });

    assert.strictEqual(renderPrototypes([prototype]), `- type: entity
  id: Crate
  components:
  - type: Sprite
    layers:
    - state: closed
`);
  });

  it('should render several prototypes in order', () => {
    const output = renderPrototypes([
      node({ type: 'entity', id: 'A' }),
      node({ type: 'entity', id: 'B' })
    ]);

    assert.strictEqual(output, '- type: entity\n  id: A\n- type: entity\n  id: B\n');
  });

  it('should quote strings that would otherwise read as other types', () => {
    const output = renderPrototypes([node({ type: 'entity', id: 'Numbered', name: '42' })]);

    assert.strictEqual(output, '- type: entity\n  id: Numbered\n  name: "42"\n');
  });

  it('should not fold long lines', () => {
    const long = Array.from({ length: 60 }, (_, i) => `word${i}`).join(' ');
    const output = renderPrototypes([node({ type: 'entity', id: 'Wordy', description: long })]);

    assert.strictEqual(output, `- type: entity\n  id: Wordy\n  description: ${long}\n`);
  });

  it('should reproduce quote styles, tags and number formatting from parsed input', () => {
    const content = `- type: entity
  id: Lamp
  name: "desk lamp"
  suffix: 'Debug'
  components:
  - type: PointLight
    energy: 0.50
    color: '#FFEEDD'
    enabled: true
  - type: Destructible
    behaviors:
    - !type:DoActsBehavior
      acts:
      - Destruction
`;
    const { prototypes } = parsePrototypes(content, 'lamp.yml');

    assert.strictEqual(renderPrototypes(prototypes), content);
  });

  it('should write a bare tag back without a value', () => {
    const content = `- type: entity
  id: Bare
  components:
  - type: Destructible
    behaviors:
    - !type:Foo
    trigger: !type:Bar
`;
    const { prototypes } = parsePrototypes(content, 'bare.yml');

    assert.strictEqual(renderPrototypes(prototypes), content);
  });

  it('should write large integers with every digit', () => {
    const content = `- type: entity
  id: Seeded
  seed: 9007199254740993
  count: 3
`;
    const { prototypes } = parsePrototypes(content, 'seed.yml');

    assert.strictEqual(renderPrototypes(prototypes), content);
  });
});

describe('writePrototypes', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'prototype-sanitizer-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create missing directories and write the rendered text', async () => {
    const destination = path.join(tempDir, 'nested', 'out.yml');

    await writePrototypes([node({ type: 'entity', id: 'A' })], destination);

    assert.strictEqual(fs.readFileSync(destination, 'utf-8'), '- type: entity\n  id: A\n');
  });
});
