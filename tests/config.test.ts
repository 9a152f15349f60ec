import assert from 'assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_SETTINGS, loadSettings, stripJsonComments } from '../src/core/Config';

export function runTests() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mission-settings-'));
  const write = (name: string, body: string) => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, body, 'utf-8');
    return file;
  };

  try {
    const absent = loadSettings(path.join(dir, 'absent.jsonc'));
    assert.deepStrictEqual(absent, DEFAULT_SETTINGS, 'missing file gives defaults');
    assert.notStrictEqual(absent, DEFAULT_SETTINGS, 'defaults are a fresh copy');
    absent.mission.scanSeconds = 1;
    assert.strictEqual(DEFAULT_SETTINGS.mission.scanSeconds, 60, 'mutating the result leaves the defaults intact');

    const commented = write('a.jsonc', [
      '{',
      '  // override the seed',
      '  "seed": 7,',
      '  /* block */ "mission": { "scanSeconds": 15 },',
      '  "logLevel": "debug"',
      '}',
    ].join('\n'));
    assert.deepStrictEqual(loadSettings(commented), {
      logLevel: 'debug',
      seed: 7,
      mission: { scanSeconds: 15 },
      actions: DEFAULT_SETTINGS.actions,
    });

    const invalid = write('b.jsonc', '{ "seed": "abc", "logLevel": "loud", "actions": { "timeScale": -1, "realtime": true } }');
    const s = loadSettings(invalid);
    assert.strictEqual(s.seed, 42, 'non-numeric seed ignored');
    assert.strictEqual(s.logLevel, 'info', 'unknown level ignored');
    assert.strictEqual(s.actions.timeScale, 0.01, 'negative timeScale ignored');
    assert.strictEqual(s.actions.realtime, true, 'valid sibling field still applied');

    const broken = write('c.jsonc', '{ "seed": ');
    const fallback = loadSettings(broken);
    assert.deepStrictEqual(fallback, DEFAULT_SETTINGS, 'malformed JSON gives defaults');
    assert.notStrictEqual(fallback, DEFAULT_SETTINGS);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }

  assert.strictEqual(stripJsonComments('{"url": "http://x"}'), '{"url": "http://x"}', 'url kept');
  assert.strictEqual(stripJsonComments('{"a": 1} // tail'), '{"a": 1} ');

  console.log('Config tests passed');
}
