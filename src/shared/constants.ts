/**
 * Application-wide constants.
 *
 * @module shared/constants
 */

export const APP_NAME = 'radiodrop';

export const VERSION = '0.1.0';
