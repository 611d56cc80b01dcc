/**
 * Log levels for the two transport log channels.
 *
 * The access channel carries routine diagnostics about what a connection is doing.
 * The error channel carries anything that went wrong, from developer detail up to fatal.
 */

export const ACCESS_LEVELS = ['connect', 'disconnect', 'devel', 'app', 'fail'] as const;
export type AccessLevel = (typeof ACCESS_LEVELS)[number];

export const ERROR_LEVELS = ['devel', 'library', 'info', 'warn', 'rerror', 'fatal'] as const;
export type ErrorLevel = (typeof ERROR_LEVELS)[number];
