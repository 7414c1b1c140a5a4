/**
 * Bootplan version constant
 */

export const VERSION = '0.1.0';
