/**
 * Host Dependencies Contract
 *
 * Services receive their logger and clock from the host instead of
 * reaching for console or Date directly. Fastify's pino logger satisfies
 * Logger as-is.
 */

export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug?: (obj: unknown, msg?: string) => void;
}

export interface Clock {
  utcNow: () => Date;
}

export const defaultClock: Clock = {
  utcNow: () => new Date(),
};
