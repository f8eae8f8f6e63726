/**
 * Color palette for the radiodrop CLI.
 *
 * @module ui/theme/colors
 */

// =============================================================================
// Base Color Palette
// =============================================================================

/**
 * Primary color palette for the application.
 */
export const colors = {
  /** Primary accent color */
  primary: 'green',

  /** Secondary accent color - for highlights */
  secondary: 'cyan',

  /** Success state color for completed operations */
  success: 'greenBright',

  /** Warning state color for attention-needed items */
  warning: 'yellow',

  /** Error state color for failures */
  error: 'red',

  /** Muted color for secondary content */
  muted: 'gray',

  /** Text color for normal content */
  text: 'white',
} as const;

/**
 * Type representing valid color values from the palette.
 */
export type Color = (typeof colors)[keyof typeof colors];

// =============================================================================
// Transfer State Colors
// =============================================================================

/**
 * Colors for sender and receiver transfer states.
 */
export const stateColors = {
  sending: 'cyan',
  collecting: 'cyan',
  assembling: 'blue',
  complete: 'greenBright',
  abandoned: 'red',
  failed: 'red',
} as const;

/**
 * Type representing valid state color values.
 */
export type StateColor = (typeof stateColors)[keyof typeof stateColors];

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Get the color for a transfer state.
 *
 * @returns The state's color, or muted if unknown
 *
 * @example
 * ```ts
 * getStateColor('collecting'); // 'cyan'
 * getStateColor('failed');     // 'red'
 * ```
 */
export function getStateColor(state: string): string {
  const normalized = state.toLowerCase();
  for (const [name, color] of Object.entries(stateColors)) {
    if (name === normalized) {
      return color;
    }
  }
  return colors.muted;
}
