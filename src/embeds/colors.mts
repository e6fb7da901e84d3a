/**
 * Color palette for Discord embeds.
 */
export const EmbedColors = {
  /** Green - the followed player won */
  VICTORY: 0x00ff00,

  /** Red - the followed player lost */
  DEFEAT: 0xff0000,
} as const;
