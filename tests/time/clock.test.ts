import { describe, it } from 'node:test';
import assert from 'node:assert';

import { PausableClock, SystemClock } from '../../src/time/clock.js';
import { ManualClock } from '../helpers/fakes.js';

describe('PausableClock', () => {
  it('should follow its source while running', () => {
    const source = new ManualClock(10);
    const clock = new PausableClock(source);

    assert.strictEqual(clock.now(), 10);
    source.advance(2);
    assert.strictEqual(clock.now(), 12);
  });

  it('should stand still while paused', () => {
    const source = new ManualClock(10);
    const clock = new PausableClock(source);

    clock.setPaused(true);
    source.advance(5);

    assert.strictEqual(clock.isPaused(), true);
    assert.strictEqual(clock.now(), 10);
  });

  it('should exclude the paused span after resuming', () => {
    const source = new ManualClock(10);
    const clock = new PausableClock(source);

    clock.setPaused(true);
    source.advance(5);
    clock.setPaused(false);
    source.advance(1);

    assert.strictEqual(clock.isPaused(), false);
    assert.strictEqual(clock.now(), 11);
  });

  it('should ignore repeated pause and resume calls', () => {
    const source = new ManualClock(0);
    const clock = new PausableClock(source);

    clock.setPaused(true);
    source.advance(2);
    clock.setPaused(true);
    source.advance(2);
    clock.setPaused(false);
    clock.setPaused(false);

    assert.strictEqual(clock.now(), 0);
  });
});

describe('SystemClock', () => {
  it('should never go backwards', () => {
    const clock = new SystemClock();
    const first = clock.now();
    const second = clock.now();

    assert.ok(second >= first);
  });
});
