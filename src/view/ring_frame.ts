export const RING_BASE_RADIUS = 160;
export const RING_PULSE_AMPLITUDE = 10;
export const RING_PULSE_FREQUENCY = 40;

export type RingFrame = {
  entropy: number;
  red: number;
  green: number;
  blue: number;
  /** `#rrggbb` */
  color: string;
  radius: number;
  diverged: boolean;
};

// Truncate toward zero and saturate into a byte; NaN becomes 0.
function toByte(value: number): number {
  if (Number.isNaN(value) || value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.trunc(value);
}

function hex(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}

/**
 * Low entropy reads green/gold, high entropy reads red, and the radius wobbles
 * with entropy around a fixed base.
 */
export function buildRingFrame(entropy: number): RingFrame {
  const red = toByte(entropy * 255);
  const green = toByte((1 - entropy) * 200 + 55);
  const blue = 0;

  return {
    entropy,
    red,
    green,
    blue,
    color: `#${hex(red)}${hex(green)}${hex(blue)}`,
    radius: RING_BASE_RADIUS + Math.sin(entropy * RING_PULSE_FREQUENCY) * RING_PULSE_AMPLITUDE,
    diverged: !Number.isFinite(entropy),
  };
}
