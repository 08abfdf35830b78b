import test from 'node:test';
import assert from 'node:assert/strict';
import { CooldownRegistry } from '../watcher/CooldownRegistry.js';
import { FakeClock } from './helpers/temp-dir.js';

test('CooldownRegistry blocks a path until the window has passed', () => {
  const clock = new FakeClock();
  const registry = new CooldownRegistry(10_000, clock.now);

  assert.equal(registry.isCoolingDown('/w/a.txt'), false);

  registry.markNotified(['/w/a.txt']);
  assert.equal(registry.isCoolingDown('/w/a.txt'), true);

  clock.advance(9_999);
  assert.equal(registry.isCoolingDown('/w/a.txt'), true);

  clock.advance(1);
  assert.equal(registry.isCoolingDown('/w/a.txt'), false);
});

test('CooldownRegistry only tracks the paths it was given', () => {
  const clock = new FakeClock();
  const registry = new CooldownRegistry(5_000, clock.now);

  registry.markNotified(['/w/a.txt', '/w/b.txt']);

  assert.equal(registry.isCoolingDown('/w/a.txt'), true);
  assert.equal(registry.isCoolingDown('/w/b.txt'), true);
  assert.equal(registry.isCoolingDown('/w/c.txt'), false);
  assert.equal(registry.lastNotifiedAt('/w/a.txt'), clock.current);
});

test('CooldownRegistry prunes expired entries when new ones are stamped', () => {
  const clock = new FakeClock();
  const registry = new CooldownRegistry(1_000, clock.now);

  registry.markNotified(['/w/old.txt']);
  clock.advance(1_500);
  registry.markNotified(['/w/new.txt']);

  assert.equal(registry.size, 1);
  assert.equal(registry.lastNotifiedAt('/w/old.txt'), undefined);
  assert.equal(registry.lastNotifiedAt('/w/new.txt'), clock.current);
});

test('CooldownRegistry with a zero window never blocks', () => {
  const registry = new CooldownRegistry(0);
  registry.markNotified(['/w/a.txt']);
  assert.equal(registry.isCoolingDown('/w/a.txt'), false);
});
