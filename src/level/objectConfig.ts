/**
 * Level Object Configuration
 *
 * Typed records for the objects placed on a map's object layer, one zod
 * schema per object kind with its defaults. Objects are dispatched by their
 * (case-insensitive) name.
 */

import { z } from 'zod';

import { ENEMY_DEFAULTS } from '../config/constants.js';
import { createRect } from '../geometry/rect.js';
import { PICKUP_TYPES } from '../entities/types.js';
import { logger } from '../utils/logging/logger.js';
import { formatZodIssues } from '../utils/validation.js';

import type { Rect } from '../platform/types.js';
import type { MapObject } from './tileMap.js';

export const LEVEL_OBJECT_KINDS = ['player', 'door', 'pickup', 'enemy', 'info'] as const;

export type LevelObjectKind = (typeof LEVEL_OBJECT_KINDS)[number];

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

const doorSchema = z.object({
  locked: z.boolean().default(true),
});

const pickupSchema = z.object({
  pickup_type: z.enum(PICKUP_TYPES).default('heart'),
});

const enemySchema = z.object({
  enemy_type: z.string().min(1).default(ENEMY_DEFAULTS.TYPE),
  enemy_movement: z.enum(['horizontal', 'vertical']).default(ENEMY_DEFAULTS.MOVEMENT),
  blocks: z.coerce.number().int().positive().default(ENEMY_DEFAULTS.BLOCKS),
});

const infoSchema = z.object({
  music: z.string().min(1).optional(),
});

export type DoorConfig = z.infer<typeof doorSchema>;
export type PickupConfig = z.infer<typeof pickupSchema>;
export type EnemyConfig = z.infer<typeof enemySchema>;
export type InfoConfig = z.infer<typeof infoSchema>;

export type LevelObjectSpec =
  | { kind: 'player'; rect: Rect }
  | { kind: 'door'; rect: Rect; config: DoorConfig }
  | { kind: 'pickup'; rect: Rect; config: PickupConfig }
  | { kind: 'enemy'; rect: Rect; config: EnemyConfig }
  | { kind: 'info'; rect: Rect; config: InfoConfig };

function isLevelObjectKind(name: string): name is LevelObjectKind {
  return LEVEL_OBJECT_KINDS.some((kind) => kind === name);
}

/**
 * Validate an object's properties against its kind's schema. Malformed
 * properties are reported and the kind's defaults are used instead.
 */
function parseConfig<T extends z.ZodTypeAny>(schema: T, object: MapObject, kind: LevelObjectKind): z.output<T> {
  const result = schema.safeParse(object.properties);
  if (result.success) {
    return result.data;
  }

  logger.warn(
    `Malformed properties on ${kind} object ${object.id}, using defaults: ${formatZodIssues(result.error).join('; ')}`,
    { component: 'level' }
  );
  return schema.parse({});
}

/**
 * Turn a map object into a typed spawn record, or null for objects the
 * engine does not know.
 */
export function parseLevelObject(object: MapObject): LevelObjectSpec | null {
  const name = object.name.trim().toLowerCase();
  const rect = createRect(object.x, object.y, object.width, object.height);

  if (!isLevelObjectKind(name)) {
    logger.warn(`Unknown object "${object.name}" (id ${object.id}) ignored`, { component: 'level' });
    return null;
  }

  switch (name) {
    case 'player':
      return { kind: 'player', rect };
    case 'door':
      return { kind: 'door', rect, config: parseConfig(doorSchema, object, name) };
    case 'pickup':
      return { kind: 'pickup', rect, config: parseConfig(pickupSchema, object, name) };
    case 'enemy':
      return { kind: 'enemy', rect, config: parseConfig(enemySchema, object, name) };
    case 'info':
      return { kind: 'info', rect, config: parseConfig(infoSchema, object, name) };
  }
}
