/**
 * Tests for engine error types.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  AnimationError,
  AssetError,
  ConfigError,
  GameError,
  MapFormatError,
  getErrorMessage,
  isAssetError,
  isConfigError,
  isGameError,
  isMapFormatError,
} from '../../src/utils/errorTypes.js';

describe('AssetError', () => {
  it('should carry the asset path in its context', () => {
    const error = AssetError.notFound('images/player.png');

    assert.strictEqual(error.message, 'Asset not found: images/player.png');
    assert.strictEqual(error.assetPath, 'images/player.png');
    assert.strictEqual(error.type, 'ASSET_ERROR');
    assert.strictEqual(error.name, 'AssetError');
    assert.deepStrictEqual(error.toJSON(), {
      type: 'ASSET_ERROR',
      message: 'Asset not found: images/player.png',
      context: { assetPath: 'images/player.png' },
    });
  });

  it('should be an Error and a GameError', () => {
    const error = new AssetError('Image undecodable');

    assert.ok(error instanceof Error);
    assert.ok(error instanceof GameError);
    assert.deepStrictEqual(error.toJSON(), {
      type: 'ASSET_ERROR',
      message: 'Image undecodable',
      context: {},
    });
  });
});

describe('MapFormatError', () => {
  it('should omit context from JSON when none is given', () => {
    const error = new MapFormatError('Infinite maps are not supported');

    assert.deepStrictEqual(error.toJSON(), {
      type: 'MAP_FORMAT_ERROR',
      message: 'Infinite maps are not supported',
    });
  });
});

describe('ConfigError', () => {
  it('should keep the validation issues', () => {
    const error = new ConfigError('Invalid game configuration', ['GAME_DEBUG: bad']);

    assert.deepStrictEqual(error.issues, ['GAME_DEBUG: bad']);
    assert.deepStrictEqual(error.context, { issues: ['GAME_DEBUG: bad'] });
  });
});

describe('type guards', () => {
  const errors = [
    new AssetError('a'),
    new MapFormatError('b'),
    new ConfigError('c'),
    new AnimationError('d'),
    new Error('e'),
  ];

  it('should recognise each error type', () => {
    assert.deepStrictEqual(errors.map(isAssetError), [true, false, false, false, false]);
    assert.deepStrictEqual(errors.map(isMapFormatError), [false, true, false, false, false]);
    assert.deepStrictEqual(errors.map(isConfigError), [false, false, true, false, false]);
    assert.deepStrictEqual(errors.map(isGameError), [true, true, true, true, false]);
  });
});

describe('getErrorMessage', () => {
  it('should read messages from errors, strings and other values', () => {
    assert.strictEqual(getErrorMessage(new Error('boom')), 'boom');
    assert.strictEqual(getErrorMessage('plain'), 'plain');
    assert.strictEqual(getErrorMessage({ code: 3 }), '{"code":3}');
    assert.strictEqual(getErrorMessage(undefined), 'undefined');
  });
});
