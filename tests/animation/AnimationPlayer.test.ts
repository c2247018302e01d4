/**
 * Tests for the AnimationPlayer frame timing.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { AnimationPlayer, validateClips } from '../../src/animation/AnimationPlayer.js';
import { AnimationError } from '../../src/utils/errorTypes.js';
import { FakeSurface, ManualClock, labelOf } from '../helpers/fakes.js';

import type { ClipSet } from '../../src/animation/AnimationPlayer.js';

const CLIPS: ClipSet = {
  walk: { frames: [[2, 0], [2, 1], [2, 2]], duration: 0.5, loop: true },
  once: { frames: [[0, 0], [0, 1]], duration: 0.25, loop: false },
};

function createPlayer(clock: ManualClock = new ManualClock()) {
  const sheet = new FakeSurface(64, 64, 'sheet');
  const player = new AnimationPlayer({ sheet, tileSize: 16, clips: CLIPS, clock });
  return { player, sheet, clock };
}

describe('validateClips', () => {
  it('should reject a clip without frames', () => {
    assert.throws(() => validateClips({ empty: { frames: [], duration: 0.1, loop: true } }), AnimationError);
  });

  it('should reject a non-positive duration', () => {
    assert.throws(
      () => validateClips({ frozen: { frames: [[0, 0]], duration: 0, loop: true } }),
      /Animation clip "frozen" needs a positive frame duration/
    );
  });

  it('should run from the constructor', () => {
    assert.throws(
      () =>
        new AnimationPlayer({
          sheet: new FakeSurface(16, 16, 'sheet'),
          tileSize: 16,
          clips: { broken: { frames: [], duration: 1, loop: false } },
          clock: new ManualClock(),
        }),
      AnimationError
    );
  });
});

describe('AnimationPlayer', () => {
  describe('play', () => {
    it('should ignore unknown clips', () => {
      const { player } = createPlayer();
      player.play('missing');

      assert.strictEqual(player.getCurrentClip(), null);
      assert.strictEqual(player.getFrame(), null);
    });

    it('should keep the frame when replaying the same clip without reset', () => {
      const { player, clock } = createPlayer();
      player.play('walk');
      clock.set(0.5);
      player.update();

      player.play('walk', false);
      assert.strictEqual(player.getFrameIndex(), 1);

      player.play('walk');
      assert.strictEqual(player.getFrameIndex(), 0);
    });

    it('should restart when switching clips even without reset', () => {
      const { player, clock } = createPlayer();
      player.play('walk');
      clock.set(0.5);
      player.update();

      player.play('once', false);
      assert.strictEqual(player.getCurrentClip(), 'once');
      assert.strictEqual(player.getFrameIndex(), 0);
      assert.strictEqual(player.isFinished(), false);
    });
  });

  describe('update', () => {
    it('should advance one frame per elapsed duration and wrap looping clips', () => {
      const { player, clock } = createPlayer();
      player.play('walk');

      clock.set(0.25);
      player.update();
      assert.strictEqual(player.getFrameIndex(), 0);

      clock.set(0.5);
      player.update();
      assert.strictEqual(player.getFrameIndex(), 1);

      // Two durations in one slow frame: 2, then wrap to 0
      clock.set(1.5);
      player.update();
      assert.strictEqual(player.getFrameIndex(), 0);
      assert.strictEqual(player.isFinished(), false);
    });

    it('should not drift when frames arrive late', () => {
      const { player, clock } = createPlayer();
      player.play('walk');

      clock.set(0.75);
      player.update();
      assert.strictEqual(player.getFrameIndex(), 1);

      // The next advance is due at 1.0, not 1.25
      clock.set(1.0);
      player.update();
      assert.strictEqual(player.getFrameIndex(), 2);
    });

    it('should pin a finished clip on its last frame', () => {
      const { player, clock } = createPlayer();
      player.play('once');

      clock.set(1.0);
      player.update();
      assert.strictEqual(player.isFinished(), true);
      assert.strictEqual(player.getFrameIndex(), 1);

      for (let i = 0; i < 20; i++) {
        clock.advance(0.25);
        player.update();
        assert.strictEqual(player.getFrameIndex(), 1);
      }
    });

    it('should keep the frame index inside the clip', () => {
      const { player, clock } = createPlayer();
      player.play('walk');

      for (let i = 0; i < 50; i++) {
        clock.advance(0.25);
        player.update();
        assert.ok(player.getFrameIndex() < 3);
      }
    });

    it('should take an explicit timestamp', () => {
      const { player } = createPlayer();
      player.play('walk');
      player.update(1.0);

      assert.strictEqual(player.getFrameIndex(), 2);
    });
  });

  describe('setPaused', () => {
    it('should freeze frames while paused', () => {
      const { player, clock } = createPlayer();
      player.play('walk');

      clock.set(0.25);
      player.setPaused(true);
      clock.set(5);
      player.update();

      assert.strictEqual(player.isPaused(), true);
      assert.strictEqual(player.getFrameIndex(), 0);
    });

    it('should not count paused time toward the next frame', () => {
      const { player, clock } = createPlayer();
      player.play('walk');

      clock.set(0.25);
      player.setPaused(true);
      clock.set(5);
      player.setPaused(false);

      clock.set(5.0);
      player.update();
      assert.strictEqual(player.getFrameIndex(), 0);

      // 0.25s before the pause plus 0.25s after it
      clock.set(5.25);
      player.update();
      assert.strictEqual(player.getFrameIndex(), 1);
    });
  });

  describe('getFrame', () => {
    it('should cut the frame from the sheet by row and column', () => {
      const { player, sheet, clock } = createPlayer();
      player.play('walk');
      clock.set(0.5);
      player.update();

      const frame = player.getFrame();
      assert.strictEqual(labelOf(frame), 'sheet@16,32');
      assert.deepStrictEqual(sheet.subsurfaces, [{ x: 16, y: 32, width: 16, height: 16 }]);
    });

    it('should cut each frame only once', () => {
      const { player, sheet } = createPlayer();
      player.play('walk');

      const first = player.getFrame();
      const second = player.getFrame();

      assert.strictEqual(first, second);
      assert.strictEqual(sheet.subsurfaces.length, 1);
    });
  });
});
