const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

export type Color = Exclude<keyof typeof COLORS, 'reset'>;

export type Paint = (color: Color, text: string) => string;

export function createPaint(enabled: boolean): Paint {
  if (!enabled) { return (_color, text) => text; }
  return (color, text) => `${COLORS[color]}${text}${COLORS.reset}`;
}
