/**
 * Layout characters and symbols for the radiodrop CLI.
 *
 * @module ui/theme/styles
 */

// =============================================================================
// Progress Bar Characters
// =============================================================================

/**
 * Characters for rendering progress bars.
 */
export const progressChars = {
  /** Filled portion of progress bar */
  filled: '█',

  /** Empty portion of progress bar */
  empty: '░',
} as const;

// =============================================================================
// Text Symbols
// =============================================================================

/**
 * Common symbols used throughout the UI.
 */
export const symbols = {
  /** Check mark for completed transfers */
  check: '✓',

  /** Cross mark for failed transfers */
  cross: '✗',

  /** Direction indicators */
  transfer: {
    send: '↑',
    receive: '↓',
  },

  /** Spinner frames for waiting states */
  spinner: ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'],
} as const;
