import assert from 'assert';
import { WindowRegistry, positionKey } from '../src/mission/WindowRegistry';
import { rectangle } from '../src/core/Detection';
import type { Quad } from '../src/core/Detection';

export function runTests() {
  // record derives center and size from the corners
  const reg = new WindowRegistry();
  const a = reg.record({ corners: rectangle(4, 4.5, 5, 2, 1) });
  assert.ok(a, 'planar observation is recorded');
  assert.strictEqual(a.id, 1);
  assert.deepStrictEqual(a.center, { x: 5, y: 5, z: 5 });
  assert.deepStrictEqual(a.size, { width: 2, height: 1 });
  assert.strictEqual(a.cleaned, false);

  // same rounded center, different geometry: first-seen wins
  const b = reg.record({ corners: rectangle(4.1, 4.55, 5, 1.8, 0.9) });
  assert.ok(b);
  assert.strictEqual(positionKey(b.center), positionKey(a.center), 'duplicate shares the quantized key');
  const c = reg.record({ corners: rectangle(10, 4.5, 5, 2, 1) });
  assert.strictEqual(reg.size, 3, 'duplicates are kept until deduplicate()');

  assert.strictEqual(reg.deduplicate(), 1);
  assert.deepStrictEqual(reg.all().map((w) => w.id), [1, 3]);
  assert.strictEqual(reg.all()[0].size.width, 2, 'first-seen attributes retained');
  assert.strictEqual(reg.deduplicate(), 0, 'deduplicate is idempotent');
  assert.deepStrictEqual(reg.all().map((w) => w.id), [1, 3]);

  // ids are never reused
  const d = reg.record({ corners: rectangle(20, 4.5, 5, 1, 1) });
  assert.strictEqual(d?.id, 4);

  // non-planar observations are rejected
  const skewed: Quad = [
    { x: 0, y: 0, z: 1 },
    { x: 1, y: 0, z: 1 },
    { x: 1, y: 1, z: 1.5 },
    { x: 0, y: 1, z: 1 },
  ];
  assert.strictEqual(reg.record({ corners: skewed }), null);
  assert.strictEqual(reg.size, 3);

  // quantization at 0.1 m
  assert.strictEqual(positionKey({ x: 5.04, y: 0, z: 0 }), positionKey({ x: 4.96, y: 0, z: 0 }));
  assert.notStrictEqual(positionKey({ x: 5.04, y: 0, z: 0 }), positionKey({ x: 5.06, y: 0, z: 0 }));
  // .x5 ties round up, so 2.25 and 2.26 collapse into one window
  assert.strictEqual(positionKey({ x: 2.25, y: 0, z: 0 }), positionKey({ x: 2.26, y: 0, z: 0 }));

  // proximity marking: strictly closer than the radius
  const hit = reg.markCleanedNear({ x: 5, y: 5, z: 4.5 }, 1.0);
  assert.deepStrictEqual(hit.map((w) => w.id), [1]);
  assert.strictEqual(c?.cleaned, false);
  assert.strictEqual(reg.cleanedCount(), 1);
  reg.markCleanedNear({ x: 5, y: 5, z: 4.5 }, 1.0);
  assert.strictEqual(reg.cleanedCount(), 1, 'marking twice is idempotent');
  assert.deepStrictEqual(reg.markCleanedNear({ x: 5, y: 5, z: 4 }, 1.0), [], 'exactly at the radius does not count');

  console.log('WindowRegistry tests passed');
}
