/**
 * Theme system for the radiodrop CLI.
 *
 * @module ui/theme
 *
 * @example
 * ```ts
 * import { colors, getStateColor } from '../theme/index.js';
 *
 * <Text color={colors.primary}>Hello</Text>
 * <Text color={getStateColor('collecting')}>collecting</Text>
 * ```
 */

export {
  colors,
  stateColors,
  getStateColor,
  type Color,
  type StateColor,
} from './colors.js';

export { progressChars, symbols } from './styles.js';
