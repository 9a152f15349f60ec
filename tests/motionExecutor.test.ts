import assert from 'assert';
import { MotionExecutor } from '../src/mission/MotionExecutor';
import { VEHICLE_PROFILE } from '../src/core/Config';
import type { Effector } from '../src/core/Actions';
import { RecordingEffector, near, silentLogger } from './fakes';

export async function runTests() {
  // short move: one leg, elapsed = distance / speed
  let fx = new RecordingEffector();
  let motion = new MotionExecutor(fx, VEHICLE_PROFILE, silentLogger);
  let res = await motion.moveTo({ x: 0, y: 0, z: 0 }, { x: 3, y: 4, z: 0 });
  assert.strictEqual(res.ok, true);
  assert.deepStrictEqual(res.position, { x: 3, y: 4, z: 0 });
  assert.strictEqual(res.elapsed, 5);
  assert.deepStrictEqual(fx.commands, [{ kind: 'move', target: { x: 3, y: 4, z: 0 }, seconds: 5 }]);

  // exactly 10 m is not split
  fx = new RecordingEffector();
  motion = new MotionExecutor(fx, VEHICLE_PROFILE, silentLogger);
  await motion.moveTo({ x: 0, y: 0, z: 0 }, { x: 10, y: 0, z: 0 });
  assert.strictEqual(fx.count('move'), 1);

  // 20 m: floor(20 / 5) + 1 = 5 equal sub-steps on the straight line
  fx = new RecordingEffector();
  motion = new MotionExecutor(fx, VEHICLE_PROFILE, silentLogger);
  res = await motion.moveTo({ x: 0, y: 0, z: 0 }, { x: 20, y: 0, z: 0 });
  assert.strictEqual(res.ok, true);
  const xs = fx.moves().map((p) => p.x);
  assert.strictEqual(xs.length, 5);
  [4, 8, 12, 16, 20].forEach((x, i) => assert.ok(near(xs[i], x), `sub-step ${i} at x=${xs[i]}`));
  assert.ok(fx.moves().every((p) => p.y === 0 && p.z === 0), 'sub-steps stay on the line');
  assert.deepStrictEqual(res.position, { x: 20, y: 0, z: 0 }, 'final position is the exact target');
  assert.ok(near(res.elapsed, 20));

  // ceiling on the second coordinate: target y=60 within 10 m fails in place
  fx = new RecordingEffector();
  motion = new MotionExecutor(fx, VEHICLE_PROFILE, silentLogger);
  res = await motion.moveTo({ x: 0, y: 50, z: 0 }, { x: 0, y: 60, z: 0 });
  assert.strictEqual(res.ok, false);
  assert.strictEqual(res.reason, 'altitude-ceiling');
  assert.deepStrictEqual(res.position, { x: 0, y: 50, z: 0 });
  assert.strictEqual(fx.commands.length, 0);

  // a high z is not limited
  res = await motion.moveTo({ x: 0, y: 0, z: 55 }, { x: 0, y: 0, z: 60 });
  assert.strictEqual(res.ok, true);

  // long move through the ceiling stops at the last reachable sub-step
  fx = new RecordingEffector();
  motion = new MotionExecutor(fx, VEHICLE_PROFILE, silentLogger);
  res = await motion.moveTo({ x: 0, y: 30, z: 0 }, { x: 0, y: 60, z: 0 });
  assert.strictEqual(res.ok, false);
  assert.strictEqual(res.reason, 'altitude-ceiling');
  assert.strictEqual(fx.count('move'), 4, '30 m -> 7 sub-steps, the 5th is above 50');
  assert.ok(near(res.position.y, 30 + (30 * 4) / 7));

  // effector failure on the second sub-step
  fx = new RecordingEffector((cmd, i) => i === 1);
  motion = new MotionExecutor(fx, VEHICLE_PROFILE, silentLogger);
  res = await motion.moveTo({ x: 0, y: 0, z: 0 }, { x: 20, y: 0, z: 0 });
  assert.strictEqual(res.ok, false);
  assert.strictEqual(res.reason, 'effector');
  assert.ok(near(res.position.x, 4));
  assert.ok(near(res.elapsed, 4));

  // a throwing effector counts as a failed move
  const throwing: Effector = { perform: async () => { throw new Error('rotor fault'); } };
  motion = new MotionExecutor(throwing, VEHICLE_PROFILE, silentLogger);
  res = await motion.moveTo({ x: 0, y: 0, z: 0 }, { x: 1, y: 0, z: 0 });
  assert.deepStrictEqual(res, { ok: false, position: { x: 0, y: 0, z: 0 }, elapsed: 0, reason: 'effector' });

  console.log('MotionExecutor tests passed');
}
