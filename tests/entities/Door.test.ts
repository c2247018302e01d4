import { describe, it } from 'node:test';
import assert from 'node:assert';

import { Door } from '../../src/entities/Door.js';

describe('Door', () => {
  it('should be locked unless told otherwise', () => {
    assert.strictEqual(new Door(0, 0, 16, 32).canEnter(), false);
    assert.strictEqual(new Door(0, 0, 16, 32, false).canEnter(), true);
  });

  it('should collide only on positive overlap', () => {
    const door = new Door(64, 32, 16, 32);

    assert.strictEqual(door.checkCollision({ x: 64, y: 48, width: 16, height: 16 }), true);
    assert.strictEqual(door.checkCollision({ x: 80, y: 32, width: 16, height: 16 }), false);
    assert.strictEqual(door.checkCollision({ x: 64, y: 64, width: 16, height: 16 }), false);
  });

  it('should never collide when it has no area', () => {
    const marker = new Door(64, 32, 0, 0);
    assert.strictEqual(marker.checkCollision({ x: 56, y: 24, width: 16, height: 16 }), false);
  });
});
