/**
 * Logging sink handed to each component. `console` satisfies it.
 */
export type ILogger = Pick<Console, 'log' | 'warn' | 'error'>;
