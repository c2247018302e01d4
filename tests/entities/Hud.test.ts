import { describe, it } from 'node:test';
import assert from 'node:assert';

import { Hud } from '../../src/entities/Hud.js';
import { FakeSurface, createTestServices } from '../helpers/fakes.js';

describe('Hud', () => {
  it('should draw a full heart per health point and empty hearts for the rest', () => {
    const { sprites } = createTestServices();
    const hud = new Hud(sprites);
    const screen = new FakeSurface(320, 240, 'screen');

    hud.draw(screen, { health: 1, maxHealth: 3 });

    assert.deepStrictEqual(screen.blitLabels(), [
      'images/ui_hud.png@0,0',
      'images/ui_hud.png@32,0',
      'images/ui_hud.png@32,0',
    ]);
    assert.deepStrictEqual(
      screen.blits.map((call) => call.dest),
      [
        { x: 16, y: 16 },
        { x: 32, y: 16 },
        { x: 48, y: 16 },
      ]
    );
  });

  it('should draw only empty hearts at zero health', () => {
    const { sprites } = createTestServices();
    const screen = new FakeSurface(320, 240, 'screen');

    new Hud(sprites).draw(screen, { health: 0, maxHealth: 3 });

    assert.deepStrictEqual(screen.blitLabels(), [
      'images/ui_hud.png@32,0',
      'images/ui_hud.png@32,0',
      'images/ui_hud.png@32,0',
    ]);
  });
});
