// apps/engine/src/lib/log.ts
export type Logger = {
  info(message: string, ...rest: unknown[]): void
  warn(message: string, ...rest: unknown[]): void
  error(message: string, ...rest: unknown[]): void
  debug(message: string, ...rest: unknown[]): void
}

export function createLogger(opts: { scope?: string; debug?: boolean } = {}): Logger {
  const tag = `[${opts.scope || 'preview'}]`
  return {
    info: (message, ...rest) => console.log(`${tag} ${message}`, ...rest),
    warn: (message, ...rest) => console.warn(`${tag} ⚠️  ${message}`, ...rest),
    error: (message, ...rest) => console.error(`[ERROR] ${tag} ${message}`, ...rest),
    debug: (message, ...rest) => {
      if (opts.debug) console.log(`${tag}:debug ${message}`, ...rest)
    },
  }
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
}
