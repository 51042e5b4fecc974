/**
 * Block type tags.
 *
 * Values are stored in uint8 grid cells and uploaded as a float vertex
 * attribute. Append-only; never reorder existing entries.
 */

export const BlockType = {
  AIR: 0,
  GRASS: 1,
  STONE: 2,
  DIRT: 3,
  WATER: 4,
} as const;
export type BlockType = (typeof BlockType)[keyof typeof BlockType];

const BLOCK_TYPE_NAMES: Record<BlockType, string> = {
  [BlockType.AIR]: 'air',
  [BlockType.GRASS]: 'grass',
  [BlockType.STONE]: 'stone',
  [BlockType.DIRT]: 'dirt',
  [BlockType.WATER]: 'water',
};

export interface Block {
  blocktype: BlockType;
}

/** Air is never rendered and never occludes a neighbour. */
export function isOpaque(type: BlockType): boolean {
  return type !== BlockType.AIR;
}

export function isBlockType(value: number): value is BlockType {
  return Object.prototype.hasOwnProperty.call(BLOCK_TYPE_NAMES, value);
}

export function blockTypeName(type: BlockType): string {
  return BLOCK_TYPE_NAMES[type];
}
